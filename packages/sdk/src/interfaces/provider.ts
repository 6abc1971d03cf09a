/**
 * Core Provider Interface
 * Contract every text-generation backend implements
 */

import type { Awaitable, ChatMessage } from '../types/messages';

/**
 * Base provider interface that all providers must implement
 */
export interface Provider {
  /** Stable short identifier, e.g. 'openai' */
  readonly id: string;
  /** Human-friendly display name */
  readonly name: string;
  readonly ready: boolean;
  /** Diagnostic text; required to be meaningful when `ready` is false */
  readonly reason: string;
  /** True if the backend consumes the full conversation, false for prompt-only backends */
  readonly supportsMessages: boolean;

  /**
   * Produce a reply. May return synchronously or asynchronously; callers go
   * through `callProvider`, which awaits either form after a single call.
   * Implementations that do real blocking work move it to a `WorkerPool`.
   */
  generate(prompt: string, messages: readonly ChatMessage[]): Awaitable<string>;
}

/**
 * Zero-argument provider factory
 */
export type ProviderFactory = () => Awaitable<Provider>;

/**
 * Runtime shape check for values produced by dynamically loaded modules
 */
export function isProvider(value: unknown): value is Provider {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'ready') === 'boolean' &&
    typeof Reflect.get(value, 'reason') === 'string' &&
    typeof Reflect.get(value, 'generate') === 'function'
  );
}
