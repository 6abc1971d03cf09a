/**
 * Anthropic Provider
 * Messages API over HTTP
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { splitSystem, toTurns } from './conversation';
import { baseUrl, optionalEnv, requiredEnv } from './env';

export const ANTHROPIC_VERSION = '2023-06-01';

export const AnthropicSettingsSchema = z
  .object({
    ANTHROPIC_API_KEY: requiredEnv('ANTHROPIC_API_KEY not set'),
    ANTHROPIC_MODEL: optionalEnv('claude-3-haiku-20240307'),
    ANTHROPIC_BASE_URL: optionalEnv('https://api.anthropic.com/v1')
  })
  .transform((env) => ({
    apiKey: env.ANTHROPIC_API_KEY,
    model: env.ANTHROPIC_MODEL,
    baseUrl: baseUrl(env.ANTHROPIC_BASE_URL)
  }));

export type AnthropicSettings = z.infer<typeof AnthropicSettingsSchema>;

const MessageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }))
});

export class AnthropicProvider extends BackendProvider<AnthropicSettings> {
  readonly id = 'anthropic';
  readonly name = 'Anthropic Claude';
  readonly supportsMessages = true;

  constructor(options: ProviderOptions = {}) {
    super(AnthropicSettingsSchema, options, (s) => `Anthropic ready (model=${s.model})`);
  }

  protected async complete(
    prompt: string,
    messages: readonly ChatMessage[],
    settings: AnthropicSettings
  ): Promise<string> {
    const { system, dialog } = splitSystem(toTurns(prompt, messages));
    const { data } = await this.http.post<unknown>(
      `${settings.baseUrl}/messages`,
      {
        model: settings.model,
        max_tokens: 512,
        messages: dialog,
        ...(system ? { system } : {})
      },
      {
        headers: {
          'x-api-key': settings.apiKey,
          'anthropic-version': ANTHROPIC_VERSION
        }
      }
    );

    // first text block wins
    const block = this.parseResponse(MessageResponseSchema, data).content.find(
      (part) => part.type === 'text'
    );
    return block?.text ?? '';
  }
}

export const getProvider: ProviderFactory = () => new AnthropicProvider();
