/**
 * Plugin Slots
 * Describes one kind of plugin (providers, frameworks) to the generic machinery
 */

import { isProvider } from '../interfaces/provider';
import type { Provider } from '../interfaces/provider';
import { isFramework } from '../interfaces/framework';
import type { Framework } from '../interfaces/framework';
import { NotReadyFramework, NotReadyProvider } from '../placeholders/not-ready';

export type PluginSlotName = 'providers' | 'frameworks';

export type PluginSource = 'builtin' | 'extension';

/**
 * A loaded module namespace (or any object standing in for one)
 */
export type PluginModule = object;

export type ModuleLoader = () => Promise<PluginModule>;

/**
 * Statically compiled table of builtin plugin modules, id -> lazy import
 */
export type BuiltinTable = Readonly<Record<string, ModuleLoader>>;

/**
 * Factory as handed out by the registries: always resolves, never rejects
 */
export type PluginFactory<T, A extends unknown[]> = (...args: A) => Promise<T>;

export interface PluginSlot<T, A extends unknown[]> {
  readonly name: PluginSlotName;
  /** Singular, for messages: 'Provider' */
  readonly kind: string;
  /** Preferred module export: a factory function */
  readonly factoryExport: string;
  /** Fallback module export: a class */
  readonly classExport: string;
  /** Members the runtime shape check looks for, for diagnostics */
  readonly shapeHint: string;
  accepts(value: unknown): value is T;
  placeholder(id: string, reason: string, ...args: A): T;
}

export const providerSlot: PluginSlot<Provider, []> = {
  name: 'providers',
  kind: 'Provider',
  factoryExport: 'getProvider',
  classExport: 'Provider',
  shapeHint: 'expected id, name, ready, reason and generate()',
  accepts: isProvider,
  placeholder: (id, reason) => new NotReadyProvider(id, reason)
};

export const frameworkSlot: PluginSlot<Framework, [Provider]> = {
  name: 'frameworks',
  kind: 'Framework',
  factoryExport: 'getFramework',
  classExport: 'Framework',
  shapeHint: 'expected id, name, ready, reason, provider and execute()',
  accepts: isFramework,
  placeholder: (id, reason, provider) => new NotReadyFramework(provider, id, reason)
};

/**
 * Canonical form of a plugin id or selector
 */
export function normalizeId(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}
