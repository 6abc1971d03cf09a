/**
 * Core Framework Interface
 * An orchestration strategy wrapping exactly one provider
 */

import type { Awaitable, ChatMessage } from '../types/messages';
import type { Provider } from './provider';

export interface Framework {
  readonly id: string;
  readonly name: string;
  readonly ready: boolean;
  readonly reason: string;
  /** Set once at construction, never swapped */
  readonly provider: Provider;

  /**
   * Run one request. Never rejects: per-request orchestration failures come
   * back as `[<id> error] <details>` strings.
   */
  execute(messages: readonly ChatMessage[]): Promise<string>;
}

/**
 * Framework factory, handed the provider the framework will own
 */
export type FrameworkFactory = (provider: Provider) => Awaitable<Framework>;

export function isFramework(value: unknown): value is Framework {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'ready') === 'boolean' &&
    typeof Reflect.get(value, 'reason') === 'string' &&
    typeof Reflect.get(value, 'execute') === 'function' &&
    typeof Reflect.get(value, 'provider') === 'object'
  );
}
