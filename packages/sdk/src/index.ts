/**
 * Switchboard SDK
 * Plugin contracts, registries and the execution shim
 */

// Types
export * from './types/errors';
export * from './types/context';
export * from './types/messages';

// Core interfaces
export * from './interfaces/provider';
export * from './interfaces/framework';

// Execution
export * from './execution/extract';
export * from './execution/shim';
export * from './execution/worker-pool';

// Plugins
export * from './plugins/slot';
export * from './plugins/safe-factory';
export * from './plugins/manifest';
export * from './plugins/locator';
export * from './placeholders/not-ready';
export * from './frameworks/base-framework';

// Registries
export * from './registry/aliases';
export * from './registry/plugin-registry';
export * from './registry/provider-registry';
export * from './registry/framework-registry';

/**
 * SDK version
 */
export const SDK_VERSION = '0.1.0';
