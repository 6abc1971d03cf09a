/**
 * Framework Registry
 * Discovers orchestration frameworks and binds them to a provider
 */

import type { Framework } from '../interfaces/framework';
import type { Provider } from '../interfaces/provider';
import { discover } from '../plugins/locator';
import type { DiscoveryOptions, PluginEntry } from '../plugins/locator';
import { frameworkSlot } from '../plugins/slot';
import { silentLogger } from '../types/context';
import { FRAMEWORK_ALIASES } from './aliases';
import { PluginRegistry } from './plugin-registry';

export const DEFAULT_FRAMEWORK_ID = 'native';

export interface FrameworkRegistryOptions extends DiscoveryOptions {
  /** Selector used when none is given; defaults to AGENT_FRAMEWORK, then 'native' */
  selected?: string;
}

export class FrameworkRegistry extends PluginRegistry<Framework, [Provider]> {
  private constructor(
    entries: ReadonlyMap<string, PluginEntry<Framework, [Provider]>>,
    private readonly options: FrameworkRegistryOptions
  ) {
    super(
      {
        slot: frameworkSlot,
        aliases: FRAMEWORK_ALIASES,
        defaultId: DEFAULT_FRAMEWORK_ID,
        emptyReason: 'No frameworks discovered'
      },
      entries,
      options,
      options.logger ?? silentLogger
    );
  }

  static async load(options: FrameworkRegistryOptions = {}): Promise<FrameworkRegistry> {
    const entries = await discover(frameworkSlot, options);
    return new FrameworkRegistry(entries, options);
  }

  get selected(): string {
    return this.resolve(
      this.options.selected ?? process.env.AGENT_FRAMEWORK ?? DEFAULT_FRAMEWORK_ID
    );
  }

  /**
   * Build the selected framework around `provider`. Never throws.
   */
  build(provider: Provider, selector?: string): Promise<Framework> {
    const wanted = selector === undefined || selector.trim() === '' ? this.selected : selector;
    return this.create(wanted, provider);
  }
}
