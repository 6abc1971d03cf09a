/**
 * BeeAI Framework
 * Selectable under the beeai ids; delegates to the provider like native
 */

import { BaseFramework } from '@switchboard/sdk';
import type { ChatMessage, FrameworkFactory } from '@switchboard/sdk';

export class BeeAIFramework extends BaseFramework {
  readonly id = 'beeai';
  readonly name = 'BeeAI Framework';
  readonly ready = true;
  readonly reason = '';

  execute(messages: readonly ChatMessage[]): Promise<string> {
    return this.direct(messages);
  }
}

export const getFramework: FrameworkFactory = (provider) => new BeeAIFramework(provider);
