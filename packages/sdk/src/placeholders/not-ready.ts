/**
 * Not-Ready Placeholders
 * Stand-ins substituted when a plugin fails to load or construct
 */

import type { Provider } from '../interfaces/provider';
import type { ChatMessage } from '../types/messages';
import { BaseFramework } from '../frameworks/base-framework';

function displayName(id: string): string {
  return id ? id.charAt(0).toUpperCase() + id.slice(1) : 'Unknown';
}

/**
 * Degenerate provider: never throws, answers with a diagnostic prefix
 */
export class NotReadyProvider implements Provider {
  readonly name: string;
  readonly ready = false;
  readonly supportsMessages = true;

  constructor(
    readonly id: string,
    readonly reason: string
  ) {
    this.name = displayName(id);
  }

  generate(prompt: string, _messages: readonly ChatMessage[] = []): string {
    const base = (prompt ?? '').trim();
    const prefix = `[${this.id} not ready: ${this.reason}] `;
    return prefix + (base ? `You said: ${base}` : 'Hello, World!');
  }
}

/**
 * Degenerate framework: reports not ready but still answers by calling its
 * provider directly, so a broken orchestration plugin does not take the
 * gateway down with it.
 */
export class NotReadyFramework extends BaseFramework {
  readonly name: string;
  readonly ready = false;

  constructor(
    provider: Provider,
    readonly id: string,
    readonly reason: string
  ) {
    super(provider);
    this.name = displayName(id);
  }

  execute(messages: readonly ChatMessage[]): Promise<string> {
    return this.direct(messages);
  }
}
