/**
 * Runtime Context
 * Logging seam shared by the registries, plugins and the gateway
 */

import pino from 'pino';

/**
 * Logger interface for structured logging
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

/**
 * Adapt a pino instance to the Logger interface (pino takes the meta object first)
 */
export function fromPino(instance: pino.Logger): Logger {
  return {
    debug: (message, meta) => instance.debug(meta ?? {}, message),
    info: (message, meta) => instance.info(meta ?? {}, message),
    warn: (message, meta) => instance.warn(meta ?? {}, message),
    error: (message, meta) => instance.error(meta ?? {}, message)
  };
}

/**
 * JSON logger on stdout
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return fromPino(
    pino({
      name: options.name ?? 'switchboard',
      level: options.level ?? 'info'
    })
  );
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
