/**
 * Native Framework
 * Pass-through: latest user text straight to the provider
 */

import { BaseFramework } from '@switchboard/sdk';
import type { ChatMessage, FrameworkFactory } from '@switchboard/sdk';

export class NativeFramework extends BaseFramework {
  readonly id = 'native';
  readonly name = 'Native PassThrough';
  readonly ready = true;
  readonly reason = '';

  execute(messages: readonly ChatMessage[]): Promise<string> {
    return this.direct(messages);
  }
}

export const getFramework: FrameworkFactory = (provider) => new NativeFramework(provider);
