/**
 * Provider Registry
 * Discovers providers, resolves selectors and memoizes the default instance
 */

import type { Provider } from '../interfaces/provider';
import { discover } from '../plugins/locator';
import type { DiscoveryOptions, PluginEntry } from '../plugins/locator';
import { providerSlot } from '../plugins/slot';
import type { PluginSource } from '../plugins/slot';
import { silentLogger } from '../types/context';
import { PROVIDER_ALIASES } from './aliases';
import { PluginRegistry } from './plugin-registry';

export const DEFAULT_PROVIDER_ID = 'echo';

export interface ProviderRegistryOptions extends DiscoveryOptions {
  /** Selector used when none is given; defaults to LLM_PROVIDER, then 'echo' */
  selected?: string;
}

export interface ProviderRequest {
  selector?: string;
  /** Build a new instance instead of returning the cached default */
  fresh?: boolean;
}

export interface ProviderReport {
  id: string;
  name: string;
  ready: boolean;
  reason: string;
  source: PluginSource;
}

export class ProviderRegistry extends PluginRegistry<Provider, []> {
  private cached?: Promise<Provider>;

  private constructor(
    entries: ReadonlyMap<string, PluginEntry<Provider, []>>,
    private readonly options: ProviderRegistryOptions
  ) {
    super(
      {
        slot: providerSlot,
        aliases: PROVIDER_ALIASES,
        defaultId: DEFAULT_PROVIDER_ID,
        emptyReason: 'No providers discovered'
      },
      entries,
      options,
      options.logger ?? silentLogger
    );
  }

  /**
   * Run discovery once and freeze the result
   */
  static async load(options: ProviderRegistryOptions = {}): Promise<ProviderRegistry> {
    const entries = await discover(providerSlot, options);
    return new ProviderRegistry(entries, options);
  }

  /**
   * The selector in effect when none is passed
   */
  get selected(): string {
    return this.resolve(this.options.selected ?? process.env.LLM_PROVIDER ?? DEFAULT_PROVIDER_ID);
  }

  /**
   * Build a new provider. Never throws.
   */
  build(selector?: string): Promise<Provider> {
    const wanted = selector === undefined || selector.trim() === '' ? this.selected : selector;
    return this.create(wanted);
  }

  /**
   * Shared default provider, built on first use. Concurrent first callers
   * share one build. A selector or `fresh` bypasses the cache.
   */
  provider(request: ProviderRequest = {}): Promise<Provider> {
    if (request.selector !== undefined || request.fresh) {
      return this.build(request.selector);
    }
    this.cached ??= this.build();
    return this.cached;
  }

  /**
   * Build every registered provider fresh and report its readiness
   */
  async inspect(): Promise<ProviderReport[]> {
    const results: ProviderReport[] = [];
    for (const [id, entry] of this.entries) {
      const provider = await entry.factory();
      results.push({
        id,
        name: provider.name,
        ready: provider.ready,
        reason: provider.reason,
        source: entry.source
      });
    }
    return results;
  }
}
