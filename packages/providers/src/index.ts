/**
 * Switchboard Providers
 * Built-in provider plugins and their module table
 */

import type { BuiltinTable } from '@switchboard/sdk';

/**
 * Builtin provider modules, imported on first use. Each exports getProvider().
 */
export const BUILTIN_PROVIDERS: BuiltinTable = {
  echo: () => import('./echo'),
  openai: () => import('./openai'),
  azure_openai: () => import('./azure-openai'),
  anthropic: () => import('./anthropic'),
  gemini: () => import('./gemini'),
  ollama: () => import('./ollama'),
  watsonx: () => import('./watsonx'),
  bedrock: () => import('./bedrock')
};

export { BackendProvider, DEFAULT_TIMEOUT_MS } from './backend-provider';
export type { ProviderOptions, SettingsSchema } from './backend-provider';
export { DEFAULT_PROMPT, resolvePrompt, splitSystem, toTurns } from './conversation';
export type { Turn, TurnRole } from './conversation';
export { describeError } from './http-errors';

// Provider classes load only through BUILTIN_PROVIDERS
