/**
 * Base Framework
 * Shared plumbing for framework implementations
 */

import type { Framework } from '../interfaces/framework';
import type { Provider } from '../interfaces/provider';
import type { ChatMessage } from '../types/messages';
import { callProvider } from '../execution/shim';
import { extractLastUserText } from '../execution/extract';

export abstract class BaseFramework implements Framework {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly ready: boolean;
  abstract readonly reason: string;

  constructor(readonly provider: Provider) {}

  abstract execute(messages: readonly ChatMessage[]): Promise<string>;

  /**
   * The plain path: latest user text plus full history straight to the provider
   */
  protected direct(messages: readonly ChatMessage[]): Promise<string> {
    return callProvider(this.provider, extractLastUserText(messages), messages);
  }
}
