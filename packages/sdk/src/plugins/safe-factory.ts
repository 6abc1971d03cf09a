/**
 * Safe Factory Wrapper
 * Turns any raw plugin factory into one that always yields a usable instance
 */

import type { Logger } from '../types/context';
import { silentLogger } from '../types/context';
import { ErrorCode, ErrorFactory } from '../types/errors';
import type { PluginFactory, PluginSlot } from './slot';

export type RawFactory<A extends unknown[]> = (...args: A) => unknown;

export interface WrapOptions {
  /** How the factory is named in diagnostics, e.g. 'getProvider()' */
  label?: string;
  logger?: Logger;
}

/**
 * Wrap `raw` so that:
 * - a throw (or rejection) becomes a placeholder whose reason is the error message
 * - a result failing the slot's shape check becomes a placeholder describing the mismatch
 * - anything else passes through untouched
 */
export function wrapFactory<T, A extends unknown[]>(
  raw: RawFactory<A>,
  fallbackId: string,
  slot: PluginSlot<T, A>,
  options: WrapOptions = {}
): PluginFactory<T, A> {
  const label = options.label ?? `${slot.factoryExport}()`;
  const logger = options.logger ?? silentLogger;

  return async (...args: A): Promise<T> => {
    let value: unknown;
    try {
      value = await raw(...args);
    } catch (error) {
      const failure = ErrorFactory.fromUnknown(ErrorCode.ConstructionFailed, error, fallbackId, {
        factory: label
      });
      logger.warn('Plugin construction failed', {
        slot: slot.name,
        pluginId: fallbackId,
        factory: label,
        error: failure.message
      });
      return slot.placeholder(fallbackId, failure.message, ...args);
    }

    if (!slot.accepts(value)) {
      const reason = `${label} did not return a ${slot.kind} (${slot.shapeHint})`;
      logger.warn('Plugin contract violation', {
        slot: slot.name,
        pluginId: fallbackId,
        code: ErrorCode.ContractViolation,
        reason
      });
      return slot.placeholder(fallbackId, reason, ...args);
    }

    return value;
  };
}
