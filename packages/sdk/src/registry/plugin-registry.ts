/**
 * Plugin Registry
 * Shared lookup, alias resolution and fallback chain for both registries
 */

import type { Logger } from '../types/context';
import { scan } from '../plugins/locator';
import type { DiscoveryOptions, PluginEntry } from '../plugins/locator';
import type { PluginSlot, PluginSource } from '../plugins/slot';
import { resolveAlias } from './aliases';
import type { AliasTable } from './aliases';

export const UNKNOWN_PLUGIN_ID = 'unknown';

export interface RegistrySettings<T, A extends unknown[]> {
  slot: PluginSlot<T, A>;
  aliases: AliasTable;
  /** First fallback when the requested id is not registered */
  defaultId: string;
  /** Reason carried by the last-resort placeholder */
  emptyReason: string;
}

/**
 * Registry over a fixed, discovered entry table. Entries never change after load.
 */
export abstract class PluginRegistry<T, A extends unknown[]> {
  protected constructor(
    protected readonly settings: RegistrySettings<T, A>,
    protected readonly entries: ReadonlyMap<string, PluginEntry<T, A>>,
    protected readonly discovery: DiscoveryOptions,
    protected readonly logger: Logger
  ) {}

  /**
   * Registered ids, builtins first
   */
  ids(): string[] {
    return Array.from(this.entries.keys());
  }

  has(selector: string): boolean {
    return this.entries.has(this.resolve(selector));
  }

  /**
   * Canonical id for a selector; `resolve(resolve(x)) === resolve(x)`
   */
  resolve(selector: string | null | undefined): string {
    return resolveAlias(this.settings.aliases, selector);
  }

  /**
   * Ids and where they come from. Re-reads the manifest; builds nothing.
   */
  list(): Promise<Record<string, PluginSource>> {
    return scan(this.settings.slot, this.discovery);
  }

  source(id: string): PluginSource | undefined {
    return this.entries.get(id)?.source;
  }

  private firstEntry(): PluginEntry<T, A> | undefined {
    for (const entry of this.entries.values()) {
      return entry;
    }
    return undefined;
  }

  /**
   * requested -> default -> first registered -> placeholder 'unknown'
   */
  protected async create(selector: string | null | undefined, ...args: A): Promise<T> {
    const { slot, defaultId, emptyReason } = this.settings;
    const requested = this.resolve(selector);

    const entry =
      this.entries.get(requested) ??
      this.entries.get(defaultId) ??
      this.firstEntry();

    if (!entry) {
      this.logger.warn(`No ${slot.name} discovered`, { requested });
      return slot.placeholder(UNKNOWN_PLUGIN_ID, emptyReason, ...args);
    }

    if (entry.id !== requested) {
      this.logger.warn(`Requested ${slot.kind.toLowerCase()} not registered, falling back`, {
        requested,
        using: entry.id
      });
    }

    return entry.factory(...args);
  }
}
