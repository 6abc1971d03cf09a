/**
 * Registry wiring
 * Builtin tables + extension manifest -> provider and framework for one process
 */

import { FrameworkRegistry, ProviderRegistry } from '@switchboard/sdk';
import type { Framework, Logger, Provider } from '@switchboard/sdk';
import { BUILTIN_PROVIDERS } from '@switchboard/providers';
import { BUILTIN_FRAMEWORKS } from '@switchboard/frameworks';
import type { GatewayConfig } from './config';

export interface Registries {
  providers: ProviderRegistry;
  frameworks: FrameworkRegistry;
}

export interface Runtime extends Registries {
  provider: Provider;
  framework: Framework;
}

export async function loadRegistries(
  config: Pick<GatewayConfig, 'llmProvider' | 'agentFramework' | 'pluginManifest'>,
  logger: Logger
): Promise<Registries> {
  const discovery = { manifestPath: config.pluginManifest, logger };
  const [providers, frameworks] = await Promise.all([
    ProviderRegistry.load({ ...discovery, builtins: BUILTIN_PROVIDERS, selected: config.llmProvider }),
    FrameworkRegistry.load({ ...discovery, builtins: BUILTIN_FRAMEWORKS, selected: config.agentFramework })
  ]);
  return { providers, frameworks };
}

/**
 * Resolve the selected provider once and hand it to the selected framework
 */
export async function buildRuntime(
  config: Pick<GatewayConfig, 'llmProvider' | 'agentFramework' | 'pluginManifest'>,
  logger: Logger
): Promise<Runtime> {
  const registries = await loadRegistries(config, logger);
  const provider = await registries.providers.provider();
  const framework = await registries.frameworks.build(provider);

  logger.info('Runtime selected', {
    provider: provider.id,
    providerReady: provider.ready,
    framework: framework.id,
    frameworkReady: framework.ready
  });
  if (!provider.ready) {
    logger.warn('Provider not ready', { provider: provider.id, reason: provider.reason });
  }

  return { ...registries, provider, framework };
}
