/**
 * Gateway Configuration
 * Environment -> validated GatewayConfig
 *
 * Values are read leniently: booleans accept true/yes/on/1 (and their
 * negatives), lists accept JSON arrays or CSV, and a trailing `# comment`
 * left in a .env file is ignored.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ErrorCode, ErrorFactory } from '@switchboard/sdk';
import type { LogLevel } from '@switchboard/sdk';

const TRUE_TOKENS = new Set(['1', 'true', 'yes', 'y', 'on']);
const FALSE_TOKENS = new Set(['0', 'false', 'no', 'n', 'off', '']);

function stripComment(value: string): string {
  return value.split('#', 1)[0].trim();
}

export function parseBool(value: unknown): unknown {
  if (typeof value === 'boolean' || value === undefined) {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    const token = stripComment(value).toLowerCase();
    if (TRUE_TOKENS.has(token)) {
      return true;
    }
    if (FALSE_TOKENS.has(token)) {
      return false;
    }
  }
  // left for zod to reject
  return value;
}

export function parseList(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => String(item).trim());
  }
  if (typeof value !== 'string') {
    return value;
  }

  const raw = stripComment(value);
  if (!raw) {
    return [];
  }
  if (raw.startsWith('[') && raw.endsWith(']')) {
    try {
      const parsed: unknown = JSON.parse(raw);
      if (Array.isArray(parsed)) {
        return parsed.map((item) => String(item).trim());
      }
    } catch {
      return splitCsv(raw.slice(1, -1));
    }
  }
  return splitCsv(raw);
}

function splitCsv(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim().replace(/^["']|["']$/g, ''))
    .filter((item) => item.length > 0);
}

export type AuthScheme = 'NONE' | 'BEARER' | 'API_KEY';

export function parseAuthScheme(value: unknown): AuthScheme {
  if (typeof value !== 'string') {
    return 'NONE';
  }
  const scheme = stripComment(value).toUpperCase();
  return scheme === 'BEARER' || scheme === 'API_KEY' ? scheme : 'NONE';
}

const text = (fallback: string) =>
  z.preprocess(
    (value) => (typeof value === 'string' ? stripComment(value) || undefined : value),
    z.string().default(fallback)
  );

const flag = (fallback: boolean) => z.preprocess(parseBool, z.boolean().default(fallback));

const list = (fallback: string[]) =>
  z.preprocess(parseList, z.array(z.string()).default(fallback));

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

/**
 * Gateway configuration schema, keyed by environment variable
 */
export const GatewayConfigSchema = z
  .object({
    AGENT_NAME: text('Switchboard Hello'),
    AGENT_DESCRIPTION: text('Greets the user and echoes their message.'),
    AGENT_VERSION: text('1.2.0'),
    PROTOCOL_VERSION: text('0.3.0'),

    A2A_HOST: text('0.0.0.0'),
    A2A_PORT: z.preprocess(
      (value) => (typeof value === 'string' ? stripComment(value) || undefined : value),
      z.coerce.number().int().min(0).max(65535).default(8000)
    ),
    PUBLIC_URL: text('http://localhost:8000'),
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === 'string' ? stripComment(value).toLowerCase() || undefined : value),
      z.enum(LOG_LEVELS).default('info')
    ),

    LLM_PROVIDER: text('echo'),
    AGENT_FRAMEWORK: text('native'),
    SWITCHBOARD_PLUGINS: text('switchboard.plugins.json'),

    CORS_ALLOW_ORIGINS: list(['*']),
    CORS_ALLOW_METHODS: list(['*']),
    CORS_ALLOW_HEADERS: list(['*']),
    CORS_ALLOW_CREDENTIALS: flag(false),

    PRIVATE_ADAPTER_ENABLED: flag(false),
    PRIVATE_ADAPTER_AUTH_SCHEME: z.preprocess(parseAuthScheme, z.enum(['NONE', 'BEARER', 'API_KEY'])),
    PRIVATE_ADAPTER_AUTH_TOKEN: z.string().default(''),
    PRIVATE_ADAPTER_INPUT_KEY: text('input'),
    PRIVATE_ADAPTER_OUTPUT_KEY: text('output'),
    PRIVATE_ADAPTER_TRACE_KEY: text('traceId'),
    PRIVATE_ADAPTER_PATH: text('/enterprise/v1/agent')
  })
  .transform((env) => ({
    agent: {
      name: env.AGENT_NAME,
      description: env.AGENT_DESCRIPTION,
      version: env.AGENT_VERSION,
      protocolVersion: env.PROTOCOL_VERSION
    },
    host: env.A2A_HOST,
    port: env.A2A_PORT,
    publicUrl: env.PUBLIC_URL.replace(/\/+$/, ''),
    logLevel: env.LOG_LEVEL satisfies LogLevel,
    llmProvider: env.LLM_PROVIDER,
    agentFramework: env.AGENT_FRAMEWORK,
    pluginManifest: resolve(env.SWITCHBOARD_PLUGINS),
    cors: {
      origins: env.CORS_ALLOW_ORIGINS,
      methods: env.CORS_ALLOW_METHODS,
      headers: env.CORS_ALLOW_HEADERS,
      credentials: env.CORS_ALLOW_CREDENTIALS
    },
    privateAdapter: {
      enabled: env.PRIVATE_ADAPTER_ENABLED,
      authScheme: env.PRIVATE_ADAPTER_AUTH_SCHEME,
      authToken: env.PRIVATE_ADAPTER_AUTH_TOKEN.trim(),
      inputKey: env.PRIVATE_ADAPTER_INPUT_KEY,
      outputKey: env.PRIVATE_ADAPTER_OUTPUT_KEY,
      traceKey: env.PRIVATE_ADAPTER_TRACE_KEY,
      path: env.PRIVATE_ADAPTER_PATH.startsWith('/')
        ? env.PRIVATE_ADAPTER_PATH
        : `/${env.PRIVATE_ADAPTER_PATH}`
    }
  }));

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export type PrivateAdapterConfig = GatewayConfig['privateAdapter'];

/**
 * Validate the environment. Throws InvalidConfigError naming every bad variable.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw ErrorFactory.create(
      ErrorCode.InvalidConfig,
      `Invalid gateway configuration (${problems.join('; ')})`,
      'gateway',
      { issues: problems }
    );
  }
  return parsed.data;
}
