/**
 * Backend Provider
 * Base for providers that call a remote model: settings from env, readiness,
 * prompt fallback and error rendering
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { z } from 'zod';
import { ErrorCode, ErrorFactory, silentLogger } from '@switchboard/sdk';
import type { ChatMessage, Logger, Provider } from '@switchboard/sdk';
import { resolvePrompt } from './conversation';
import type { Env } from './env';
import { describeError } from './http-errors';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ProviderOptions {
  /** Defaults to process.env */
  env?: Env;
  /** Defaults to a fresh axios instance with a 30s timeout */
  http?: AxiosInstance;
  logger?: Logger;
}

export type SettingsSchema<S> = z.ZodType<S, z.ZodTypeDef, unknown>;

export abstract class BackendProvider<S> implements Provider {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly supportsMessages: boolean;

  readonly ready: boolean;
  readonly reason: string;

  protected readonly http: AxiosInstance;
  protected readonly logger: Logger;
  private readonly settings?: S;

  protected constructor(
    schema: SettingsSchema<S>,
    options: ProviderOptions,
    describeReady: (settings: S) => string
  ) {
    this.http = options.http ?? axios.create({ timeout: DEFAULT_TIMEOUT_MS });
    this.logger = options.logger ?? silentLogger;

    const parsed = schema.safeParse(options.env ?? process.env);
    if (parsed.success) {
      this.settings = parsed.data;
      this.ready = true;
      this.reason = describeReady(parsed.data);
    } else {
      const config = ErrorFactory.create(
        ErrorCode.InvalidConfig,
        Array.from(new Set(parsed.error.issues.map((issue) => issue.message))).join('; '),
        'provider'
      );
      this.ready = false;
      this.reason = config.message;
      this.logger.debug('Provider not configured', config.toJSON());
    }
  }

  async generate(prompt: string, messages: readonly ChatMessage[] = []): Promise<string> {
    if (this.settings === undefined) {
      return `[${this.id} not ready] ${this.reason}`;
    }

    const text = resolvePrompt(prompt, messages);
    try {
      const reply = (await this.complete(text, messages, this.settings)).trim();
      return reply || `Empty response from ${this.name}.`;
    } catch (error) {
      const details = describeError(error);
      this.logger.warn('Backend call failed', { provider: this.id, error: details });
      return `[${this.id} error] ${details}`;
    }
  }

  /**
   * One backend round trip. Throw on failure; the base renders the error.
   */
  protected abstract complete(
    prompt: string,
    messages: readonly ChatMessage[],
    settings: S
  ): Promise<string>;

  /**
   * Validate a response body, failing with the backend's id attached
   */
  protected parseResponse<T>(schema: SettingsSchema<T>, data: unknown): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw ErrorFactory.create(
        ErrorCode.BackendFailure,
        `Unexpected response from ${this.name}`,
        this.id,
        { issues: parsed.error.issues.map((issue) => issue.message) }
      );
    }
    return parsed.data;
  }
}
