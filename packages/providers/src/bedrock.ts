/**
 * Bedrock Provider
 * AWS Bedrock Converse API through the AWS SDK
 */

import {
  BedrockRuntimeClient,
  ConverseCommand
} from '@aws-sdk/client-bedrock-runtime';
import type { ConverseCommandInput, ConverseCommandOutput } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { ChatMessage, Provider, ProviderFactory } from '@switchboard/sdk';
import { BackendProvider } from './backend-provider';
import type { ProviderOptions } from './backend-provider';
import { optionalEnv } from './env';

export const BedrockSettingsSchema = z
  .object({
    AWS_REGION: z.string().optional(),
    AWS_DEFAULT_REGION: z.string().optional(),
    BEDROCK_MODEL_ID: optionalEnv('anthropic.claude-3-haiku-20240307-v1:0'),
    BEDROCK_ENDPOINT: z.string().optional()
  })
  .transform((env) => ({
    region: env.AWS_REGION?.trim() || env.AWS_DEFAULT_REGION?.trim() || 'us-east-1',
    modelId: env.BEDROCK_MODEL_ID,
    endpoint: env.BEDROCK_ENDPOINT?.trim() || undefined
  }));

export type BedrockSettings = z.infer<typeof BedrockSettingsSchema>;

export type Converse = (input: ConverseCommandInput) => Promise<ConverseCommandOutput>;

export interface BedrockProviderOptions extends ProviderOptions {
  /** Replaces the SDK client call */
  converse?: Converse;
}

/**
 * Credentials come from the default AWS chain (env, profile, instance role)
 */
export class BedrockProvider extends BackendProvider<BedrockSettings> {
  readonly id = 'bedrock';
  readonly name = 'AWS Bedrock';
  readonly supportsMessages = false;

  private readonly converse?: Converse;
  private client?: BedrockRuntimeClient;

  constructor(options: BedrockProviderOptions = {}) {
    super(BedrockSettingsSchema, options, (s) => `Bedrock client ready (model=${s.modelId})`);
    this.converse = options.converse;
  }

  protected async complete(
    prompt: string,
    _messages: readonly ChatMessage[],
    settings: BedrockSettings
  ): Promise<string> {
    const converse = this.converse ?? this.sdkConverse(settings);
    const output = await converse({
      modelId: settings.modelId,
      messages: [{ role: 'user', content: [{ text: prompt }] }],
      inferenceConfig: { maxTokens: 512 }
    });

    // first text block wins
    for (const block of output.output?.message?.content ?? []) {
      if (block.text !== undefined) {
        return block.text;
      }
    }
    return '';
  }

  private sdkConverse(settings: BedrockSettings): Converse {
    this.client ??= new BedrockRuntimeClient({
      region: settings.region,
      endpoint: settings.endpoint
    });
    const client = this.client;
    return (input) => client.send(new ConverseCommand(input));
  }
}

export const getProvider: ProviderFactory = () => new BedrockProvider();
