/**
 * Plugin Locator
 * Builds the id -> factory table for one slot from the builtin table and extensions
 */

import type { Logger } from '../types/context';
import { silentLogger } from '../types/context';
import { ErrorCode, ErrorFactory } from '../types/errors';
import { readManifest } from './manifest';
import type { ExtensionDescriptor } from './manifest';
import { wrapFactory } from './safe-factory';
import { normalizeId } from './slot';
import type {
  BuiltinTable,
  ModuleLoader,
  PluginFactory,
  PluginModule,
  PluginSlot,
  PluginSlotName,
  PluginSource
} from './slot';

export interface PluginEntry<T, A extends unknown[]> {
  id: string;
  source: PluginSource;
  factory: PluginFactory<T, A>;
}

export interface DiscoveryOptions {
  builtins?: BuiltinTable;
  /** Extension manifest, read afresh on every discovery or scan */
  manifestPath?: string;
  /** Extensions registered in code, applied after the manifest */
  extensions?: readonly ExtensionDescriptor[];
  logger?: Logger;
}

type Callable = (...args: unknown[]) => unknown;
type Constructor = new (...args: unknown[]) => unknown;

function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

function isClass(value: unknown): value is Constructor {
  return typeof value === 'function' && /^class[\s{]/.test(Function.prototype.toString.call(value));
}

function stub<T, A extends unknown[]>(
  slot: PluginSlot<T, A>,
  id: string,
  reason: string
): PluginFactory<T, A> {
  return async (...args: A) => slot.placeholder(id, reason, ...args);
}

/**
 * Pick a factory out of a loaded module
 */
function inspect<T, A extends unknown[]>(
  slot: PluginSlot<T, A>,
  id: string,
  mod: PluginModule,
  exportName: string | undefined,
  logger: Logger
): PluginFactory<T, A> {
  if (exportName !== undefined) {
    const target: unknown = Reflect.get(mod, exportName);
    const label = `${exportName}()`;
    if (slot.accepts(target)) {
      return async () => target;
    }
    if (isClass(target)) {
      return wrapFactory((...args: A) => new target(...args), id, slot, { label, logger });
    }
    if (isCallable(target)) {
      return wrapFactory((...args: A) => target(...args), id, slot, { label, logger });
    }
    return stub(slot, id, `Export ${exportName} is not a ${slot.kind}, a class or a factory`);
  }

  const factory: unknown = Reflect.get(mod, slot.factoryExport);
  if (isCallable(factory)) {
    return wrapFactory((...args: A) => factory(...args), id, slot, {
      label: `${slot.factoryExport}()`,
      logger
    });
  }

  const ctor: unknown = Reflect.get(mod, slot.classExport);
  if (isConstructor(ctor)) {
    return wrapFactory((...args: A) => new ctor(...args), id, slot, {
      label: `${slot.classExport}()`,
      logger
    });
  }

  logger.warn('Plugin module has no usable export', { slot: slot.name, pluginId: id });
  return stub(
    slot,
    id,
    `Module did not expose ${slot.factoryExport}() or a ${slot.classExport} class`
  );
}

/**
 * Factory that imports its module on first use and remembers what it found
 */
function lazyFactory<T, A extends unknown[]>(
  slot: PluginSlot<T, A>,
  id: string,
  load: ModuleLoader,
  exportName: string | undefined,
  logger: Logger
): PluginFactory<T, A> {
  let resolved: Promise<PluginFactory<T, A>> | undefined;

  const resolveFactory = async (): Promise<PluginFactory<T, A>> => {
    try {
      const mod = await load();
      return inspect(slot, id, mod, exportName, logger);
    } catch (error) {
      const failure = ErrorFactory.fromUnknown(ErrorCode.ImportFailed, error, id, {
        slot: slot.name
      });
      logger.warn('Plugin import failed', failure.toJSON());
      return stub(slot, id, `Import error: ${failure.message}`);
    }
  };

  return async (...args: A): Promise<T> => {
    resolved ??= resolveFactory();
    const factory = await resolved;
    return factory(...args);
  };
}

async function collectExtensions(
  slotName: PluginSlotName,
  options: DiscoveryOptions,
  logger: Logger
): Promise<ExtensionDescriptor[]> {
  const fromManifest = await readManifest(options.manifestPath, logger);
  return [...fromManifest, ...(options.extensions ?? [])].filter(
    (descriptor) => descriptor.slot === slotName
  );
}

/**
 * Discover every plugin for `slot`. Never throws; modules are not imported
 * until their factory is first called.
 */
export async function discover<T, A extends unknown[]>(
  slot: PluginSlot<T, A>,
  options: DiscoveryOptions = {}
): Promise<Map<string, PluginEntry<T, A>>> {
  const logger = options.logger ?? silentLogger;
  const entries = new Map<string, PluginEntry<T, A>>();

  for (const [key, load] of Object.entries(options.builtins ?? {})) {
    const id = normalizeId(key);
    entries.set(id, {
      id,
      source: 'builtin',
      factory: lazyFactory(slot, id, load, undefined, logger)
    });
  }

  for (const descriptor of await collectExtensions(slot.name, options, logger)) {
    const id = normalizeId(descriptor.id);
    if (entries.has(id)) {
      logger.info('Extension overrides plugin', { slot: slot.name, pluginId: id });
    }
    entries.set(id, {
      id,
      source: 'extension',
      factory: lazyFactory(slot, id, descriptor.load, descriptor.exportName, logger)
    });
  }

  logger.debug('Plugins discovered', { slot: slot.name, ids: Array.from(entries.keys()) });
  return entries;
}

/**
 * Metadata-only pass: ids and sources, without building any factory
 */
export async function scan<T, A extends unknown[]>(
  slot: PluginSlot<T, A>,
  options: DiscoveryOptions = {}
): Promise<Record<string, PluginSource>> {
  const logger = options.logger ?? silentLogger;
  const sources: Record<string, PluginSource> = {};

  for (const key of Object.keys(options.builtins ?? {})) {
    sources[normalizeId(key)] = 'builtin';
  }
  for (const descriptor of await collectExtensions(slot.name, options, logger)) {
    sources[normalizeId(descriptor.id)] = 'extension';
  }

  return sources;
}
