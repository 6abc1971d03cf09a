/**
 * Azure OpenAI Provider
 * Chat Completions against an Azure deployment
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { toTurns } from './conversation';
import { baseUrl, optionalEnv } from './env';
import { ChatCompletionSchema } from './openai';

const MISSING = 'Missing AZURE_OPENAI_API_KEY/ENDPOINT/DEPLOYMENT';

export const AzureOpenAISettingsSchema = z
  .object({
    AZURE_OPENAI_API_KEY: z.string().optional(),
    AZURE_OPENAI_ENDPOINT: z.string().optional(),
    AZURE_OPENAI_DEPLOYMENT: z.string().optional(),
    AZURE_OPENAI_API_VERSION: optionalEnv('2024-08-01-preview')
  })
  .transform((env, ctx) => {
    const apiKey = env.AZURE_OPENAI_API_KEY?.trim();
    const endpoint = env.AZURE_OPENAI_ENDPOINT?.trim();
    const deployment = env.AZURE_OPENAI_DEPLOYMENT?.trim();
    if (!apiKey || !endpoint || !deployment) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: MISSING });
      return z.NEVER;
    }
    return {
      apiKey,
      endpoint: baseUrl(endpoint),
      deployment,
      apiVersion: env.AZURE_OPENAI_API_VERSION
    };
  });

export type AzureOpenAISettings = z.infer<typeof AzureOpenAISettingsSchema>;

export class AzureOpenAIProvider extends BackendProvider<AzureOpenAISettings> {
  readonly id = 'azure_openai';
  readonly name = 'Azure OpenAI';
  readonly supportsMessages = true;

  constructor(options: ProviderOptions = {}) {
    super(
      AzureOpenAISettingsSchema,
      options,
      (s) => `Azure OpenAI ready (deployment=${s.deployment})`
    );
  }

  protected async complete(
    prompt: string,
    messages: readonly ChatMessage[],
    settings: AzureOpenAISettings
  ): Promise<string> {
    const url = `${settings.endpoint}/openai/deployments/${encodeURIComponent(settings.deployment)}/chat/completions`;
    const { data } = await this.http.post<unknown>(
      url,
      { messages: toTurns(prompt, messages), temperature: 0.2 },
      {
        params: { 'api-version': settings.apiVersion },
        headers: { 'api-key': settings.apiKey }
      }
    );
    return this.parseResponse(ChatCompletionSchema, data).choices[0].message.content ?? '';
  }
}

export const getProvider: ProviderFactory = () => new AzureOpenAIProvider();
