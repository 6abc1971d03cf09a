/**
 * CrewAI Framework
 * Selectable under the crewai ids. CrewAI has no JavaScript runtime, so this
 * framework always runs its fallback: the provider answers directly.
 */

import { BaseFramework } from '@switchboard/sdk';
import type { ChatMessage, FrameworkFactory, Provider } from '@switchboard/sdk';

export const CREWAI_UNAVAILABLE = 'CrewAI has no JavaScript runtime';

export class CrewAIFramework extends BaseFramework {
  readonly id = 'crewai';
  readonly name = 'CrewAI Framework';
  readonly ready = true;
  readonly reason: string;

  constructor(provider: Provider, unavailable: string = CREWAI_UNAVAILABLE) {
    super(provider);
    this.reason = `CrewAI unavailable, fallback active: ${unavailable}`;
  }

  execute(messages: readonly ChatMessage[]): Promise<string> {
    return this.direct(messages);
  }
}

export const getFramework: FrameworkFactory = (provider) => new CrewAIFramework(provider);
