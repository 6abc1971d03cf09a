/**
 * Alias Tables
 * Friendly selector -> canonical plugin id
 */

import { normalizeId } from '../plugins/slot';

export type AliasTable = Readonly<Record<string, string>>;

// Every canonical id maps to itself so resolution is idempotent
export const PROVIDER_ALIASES: AliasTable = {
  echo: 'echo',
  openai: 'openai',
  azure: 'azure_openai',
  'azure-openai': 'azure_openai',
  azure_openai: 'azure_openai',
  watsonx: 'watsonx',
  ollama: 'ollama',
  anthropic: 'anthropic',
  claude: 'anthropic',
  gemini: 'gemini',
  google: 'gemini',
  bedrock: 'bedrock'
};

export const FRAMEWORK_ALIASES: AliasTable = {
  native: 'native',
  direct: 'native',
  langgraph: 'langgraph',
  lg: 'langgraph',
  crewai: 'crewai',
  crew: 'crewai',
  'crew.ai': 'crewai',
  beeai: 'beeai',
  'bee.ai': 'beeai',
  beeai_framework: 'beeai'
};

/**
 * Trim, lower-case, then map through the alias table. Unknown selectors pass
 * through normalized.
 */
export function resolveAlias(table: AliasTable, selector: string | null | undefined): string {
  const id = normalizeId(selector);
  return Object.hasOwn(table, id) ? table[id] : id;
}
