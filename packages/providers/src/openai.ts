/**
 * OpenAI Provider
 * Chat Completions over HTTP
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { toTurns } from './conversation';
import { baseUrl, optionalEnv, requiredEnv } from './env';

export const OpenAISettingsSchema = z
  .object({
    OPENAI_API_KEY: requiredEnv('OPENAI_API_KEY not set'),
    OPENAI_MODEL: optionalEnv('gpt-4o-mini'),
    OPENAI_BASE_URL: optionalEnv('https://api.openai.com/v1')
  })
  .transform((env) => ({
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    baseUrl: baseUrl(env.OPENAI_BASE_URL)
  }));

export type OpenAISettings = z.infer<typeof OpenAISettingsSchema>;

/**
 * Chat Completions response, as far as it is read
 */
export const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }) }))
    .min(1)
});

export class OpenAIProvider extends BackendProvider<OpenAISettings> {
  readonly id = 'openai';
  readonly name = 'OpenAI';
  readonly supportsMessages = true;

  constructor(options: ProviderOptions = {}) {
    super(OpenAISettingsSchema, options, (s) => `OpenAI ready (model=${s.model})`);
  }

  protected async complete(
    prompt: string,
    messages: readonly ChatMessage[],
    settings: OpenAISettings
  ): Promise<string> {
    const { data } = await this.http.post<unknown>(
      `${settings.baseUrl}/chat/completions`,
      { model: settings.model, messages: toTurns(prompt, messages) },
      { headers: { Authorization: `Bearer ${settings.apiKey}` } }
    );
    return this.parseResponse(ChatCompletionSchema, data).choices[0].message.content ?? '';
  }
}

export const getProvider: ProviderFactory = () => new OpenAIProvider();
