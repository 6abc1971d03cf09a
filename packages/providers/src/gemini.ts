/**
 * Gemini Provider
 * generateContent over HTTP
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { splitSystem, toTurns } from './conversation';
import { baseUrl, optionalEnv, requiredEnv } from './env';

export const GeminiSettingsSchema = z
  .object({
    GOOGLE_API_KEY: requiredEnv('GOOGLE_API_KEY not set'),
    GEMINI_MODEL: optionalEnv('gemini-1.5-pro'),
    GEMINI_BASE_URL: optionalEnv('https://generativelanguage.googleapis.com/v1beta')
  })
  .transform((env) => ({
    apiKey: env.GOOGLE_API_KEY,
    model: env.GEMINI_MODEL,
    baseUrl: baseUrl(env.GEMINI_BASE_URL)
  }));

export type GeminiSettings = z.infer<typeof GeminiSettingsSchema>;

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) })
          .optional()
      })
    )
    .default([])
});

export class GeminiProvider extends BackendProvider<GeminiSettings> {
  readonly id = 'gemini';
  readonly name = 'Google Gemini';
  readonly supportsMessages = true;

  constructor(options: ProviderOptions = {}) {
    super(GeminiSettingsSchema, options, (s) => `Gemini ready (model=${s.model})`);
  }

  protected async complete(
    prompt: string,
    messages: readonly ChatMessage[],
    settings: GeminiSettings
  ): Promise<string> {
    const { system, dialog } = splitSystem(toTurns(prompt, messages));
    const { data } = await this.http.post<unknown>(
      `${settings.baseUrl}/models/${encodeURIComponent(settings.model)}:generateContent`,
      {
        contents: dialog.map((turn) => ({
          role: turn.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: turn.content }]
        })),
        ...(system ? { systemInstruction: { parts: [{ text: system }] } } : {})
      },
      { headers: { 'x-goog-api-key': settings.apiKey } }
    );

    const [candidate] = this.parseResponse(GenerateContentSchema, data).candidates;
    return (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');
  }
}

export const getProvider: ProviderFactory = () => new GeminiProvider();
