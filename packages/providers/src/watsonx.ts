/**
 * watsonx.ai Provider
 * IAM API-key exchange, then the text generation endpoint
 */

import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { baseUrl, optionalEnv } from './env';

export const WATSONX_API_VERSION = '2023-05-29';

const MISSING = 'Missing WATSONX_API_KEY, WATSONX_URL, or WATSONX_PROJECT_ID';

export const WatsonxSettingsSchema = z
  .object({
    WATSONX_API_KEY: z.string().optional(),
    WATSONX_URL: z.string().optional(),
    WATSONX_PROJECT_ID: z.string().optional(),
    MODEL_ID: optionalEnv('ibm/granite-3-3-8b-instruct'),
    WATSONX_IAM_URL: optionalEnv('https://iam.cloud.ibm.com/identity/token')
  })
  .transform((env, ctx) => {
    const apiKey = env.WATSONX_API_KEY?.trim();
    const url = env.WATSONX_URL?.trim();
    const projectId = env.WATSONX_PROJECT_ID?.trim();
    if (!apiKey || !url || !projectId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: MISSING });
      return z.NEVER;
    }
    return { apiKey, url: baseUrl(url), projectId, modelId: env.MODEL_ID, iamUrl: env.WATSONX_IAM_URL };
  });

export type WatsonxSettings = z.infer<typeof WatsonxSettingsSchema>;

const TokenSchema = z.object({
  access_token: z.string().min(1),
  // epoch seconds
  expiration: z.number().optional()
});

const GenerationSchema = z.object({
  results: z.array(z.object({ generated_text: z.string().nullish() })).default([])
});

interface CachedToken {
  value: string;
  expiresAt: number;
}

// Refresh this long before the token expires
const TOKEN_SKEW_MS = 60_000;

export class WatsonxProvider extends BackendProvider<WatsonxSettings> {
  readonly id = 'watsonx';
  readonly name = 'IBM watsonx.ai';
  readonly supportsMessages = false;

  private token?: Promise<CachedToken>;

  constructor(options: ProviderOptions = {}) {
    super(WatsonxSettingsSchema, options, (s) => `watsonx.ai ready (model=${s.modelId})`);
  }

  protected async complete(
    prompt: string,
    _messages: readonly ChatMessage[],
    settings: WatsonxSettings
  ): Promise<string> {
    const token = await this.accessToken(settings);
    const { data } = await this.http.post<unknown>(
      `${settings.url}/ml/v1/text/generation`,
      {
        input: prompt,
        model_id: settings.modelId,
        project_id: settings.projectId,
        parameters: { decoding_method: 'greedy', max_new_tokens: 256 }
      },
      {
        params: { version: WATSONX_API_VERSION },
        headers: { Authorization: `Bearer ${token}` }
      }
    );

    const [result] = this.parseResponse(GenerationSchema, data).results;
    if (!result) {
      return 'Sorry, empty response from watsonx.ai.';
    }
    return result.generated_text ?? '';
  }

  /**
   * Bearer token, shared between concurrent calls and reused until near expiry
   */
  private async accessToken(settings: WatsonxSettings): Promise<string> {
    if (this.token) {
      // a failed exchange was already reported to the call that started it
      const cached = await this.token.catch(() => undefined);
      if (cached && cached.expiresAt - TOKEN_SKEW_MS > Date.now()) {
        return cached.value;
      }
    }

    const next = this.exchange(settings);
    this.token = next;
    return (await next).value;
  }

  private async exchange(settings: WatsonxSettings): Promise<CachedToken> {
    const form = new URLSearchParams({
      grant_type: 'urn:ibm:params:oauth:grant-type:apikey',
      apikey: settings.apiKey
    });
    const { data } = await this.http.post<unknown>(settings.iamUrl, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' }
    });
    const token = this.parseResponse(TokenSchema, data);
    return {
      value: token.access_token,
      expiresAt: token.expiration ? token.expiration * 1000 : Date.now() + 3_600_000
    };
  }
}

export const getProvider: ProviderFactory = () => new WatsonxProvider();
