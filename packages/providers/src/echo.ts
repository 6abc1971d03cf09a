/**
 * Echo Provider
 * Always-ready provider that repeats the prompt back
 */

import type { Provider, ProviderFactory } from '@switchboard/sdk';

export class EchoProvider implements Provider {
  readonly id = 'echo';
  readonly name = 'Echo';
  readonly ready = true;
  readonly reason = 'Echo provider is always ready.';
  readonly supportsMessages = true;

  generate(prompt: string): string {
    const text = (prompt ?? '').trim();
    return text ? `Hello, you said: ${text}` : 'Hello, World!';
  }
}

export const getProvider: ProviderFactory = () => new EchoProvider();
