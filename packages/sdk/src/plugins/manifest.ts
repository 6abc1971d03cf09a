/**
 * Extension Manifest
 * JSON plugin descriptors validated with zod
 *
 * {
 *   "plugins": [
 *     { "slot": "providers", "id": "acme", "module": "./acme-provider.mjs" },
 *     { "slot": "frameworks", "id": "crew", "module": "@acme/crew", "export": "CrewFramework" }
 *   ]
 * }
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { Logger } from '../types/context';
import { silentLogger } from '../types/context';
import { ErrorCode, ErrorFactory } from '../types/errors';
import type { ModuleLoader, PluginModule, PluginSlotName } from './slot';
import { normalizeId } from './slot';

export const DEFAULT_MANIFEST_FILE = 'switchboard.plugins.json';

export const PluginDescriptorSchema = z.object({
  slot: z.enum(['providers', 'frameworks']),
  id: z.string().trim().min(1, 'id must not be blank'),
  module: z.string().trim().min(1, 'module must not be blank'),
  export: z.string().trim().min(1).optional()
});

export type PluginDescriptor = z.infer<typeof PluginDescriptorSchema>;

// Entries are validated one by one so a bad entry only drops itself
export const PluginManifestSchema = z.object({
  plugins: z.array(z.unknown()).default([])
});

/**
 * An extension ready for the locator: where it lives and how to load it
 */
export interface ExtensionDescriptor {
  slot: PluginSlotName;
  id: string;
  load: ModuleLoader;
  /** Named export to use instead of the conventional factory / class */
  exportName?: string;
}

/**
 * Resolve a manifest `module` field to something `import()` accepts
 */
export function resolveSpecifier(specifier: string, manifestPath: string): string {
  if (specifier.startsWith('./') || specifier.startsWith('../')) {
    return pathToFileURL(resolve(dirname(manifestPath), specifier)).href;
  }
  if (isAbsolute(specifier)) {
    return pathToFileURL(specifier).href;
  }
  return specifier;
}

export function importLoader(specifier: string): ModuleLoader {
  return async (): Promise<PluginModule> => {
    const mod: unknown = await import(/* @vite-ignore */ specifier);
    if (typeof mod !== 'object' || mod === null) {
      throw ErrorFactory.create(ErrorCode.ImportFailed, `${specifier} is not a module`, specifier);
    }
    return mod;
  };
}

/**
 * Read a manifest file. Never throws: a missing file is an empty manifest,
 * unreadable or invalid content is logged and skipped.
 */
export async function readManifest(
  manifestPath: string | undefined,
  logger: Logger = silentLogger
): Promise<ExtensionDescriptor[]> {
  if (!manifestPath) {
    return [];
  }

  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') {
      logger.debug('No extension manifest', { manifestPath });
    } else {
      logger.warn('Extension manifest unreadable', {
        manifestPath,
        error: ErrorFactory.messageOf(error)
      });
    }
    return [];
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    const failure = ErrorFactory.fromUnknown(ErrorCode.InvalidManifest, error, 'manifest', {
      manifestPath
    });
    logger.warn('Extension manifest is not valid JSON', failure.toJSON());
    return [];
  }

  const manifest = PluginManifestSchema.safeParse(document);
  if (!manifest.success) {
    logger.warn('Extension manifest rejected', {
      manifestPath,
      code: ErrorCode.InvalidManifest,
      issues: manifest.error.issues.map((issue) => issue.message)
    });
    return [];
  }

  const descriptors: ExtensionDescriptor[] = [];
  manifest.data.plugins.forEach((entry, index) => {
    const parsed = PluginDescriptorSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn('Skipping invalid plugin descriptor', {
        manifestPath,
        index,
        code: ErrorCode.InvalidManifest,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
      return;
    }

    const descriptor = parsed.data;
    descriptors.push({
      slot: descriptor.slot,
      id: normalizeId(descriptor.id),
      load: importLoader(resolveSpecifier(descriptor.module, manifestPath)),
      exportName: descriptor.export
    });
  });

  return descriptors;
}
