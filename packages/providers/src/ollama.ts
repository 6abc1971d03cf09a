/**
 * Ollama Provider
 * Local daemon, prompt-only /api/generate endpoint
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { baseUrl, optionalEnv } from './env';

export const OllamaSettingsSchema = z
  .object({
    OLLAMA_BASE_URL: optionalEnv('http://localhost:11434'),
    OLLAMA_MODEL: optionalEnv('llama3')
  })
  .transform((env) => ({
    baseUrl: baseUrl(env.OLLAMA_BASE_URL),
    model: env.OLLAMA_MODEL
  }));

export type OllamaSettings = z.infer<typeof OllamaSettingsSchema>;

const GenerateResponseSchema = z.object({ response: z.string().nullish() });

/**
 * Ready as soon as it is configured; an unreachable daemon shows up per call
 */
export class OllamaProvider extends BackendProvider<OllamaSettings> {
  readonly id = 'ollama';
  readonly name = 'Ollama';
  readonly supportsMessages = false;

  constructor(options: ProviderOptions = {}) {
    super(OllamaSettingsSchema, options, (s) => `Ollama ready (model=${s.model})`);
  }

  protected async complete(
    prompt: string,
    _messages: readonly ChatMessage[],
    settings: OllamaSettings
  ): Promise<string> {
    const { data } = await this.http.post<unknown>(`${settings.baseUrl}/api/generate`, {
      model: settings.model,
      prompt,
      stream: false
    });
    return this.parseResponse(GenerateResponseSchema, data).response ?? '';
  }
}

export const getProvider: ProviderFactory = () => new OllamaProvider();
