/**
 * Switchboard Error Model
 * Stable, typed errors with plugin-neutral codes
 *
 * These errors never cross the core's public boundary: the registries and the
 * execution shim render them into `reason` strings or bracketed payloads.
 * They exist so the rendering happens in one place, with a stable code and
 * the plugin id attached for logging.
 */

export enum ErrorCode {
  // Discovery
  ImportFailed = 'IMPORT_FAILED',
  ContractViolation = 'CONTRACT_VIOLATION',
  InvalidManifest = 'INVALID_MANIFEST',

  // Construction
  ConstructionFailed = 'CONSTRUCTION_FAILED',
  InvalidConfig = 'INVALID_CONFIG',

  // Request time
  BackendFailure = 'BACKEND_FAILURE',

  // Lookup
  NotFound = 'NOT_FOUND',

  // Catch-all
  Internal = 'INTERNAL'
}

/**
 * Base error class
 */
export abstract class SwitchboardError extends Error {
  abstract readonly code: ErrorCode;

  public readonly pluginId: string;
  public readonly causeType: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    pluginId: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.pluginId = pluginId;
    this.causeType = cause instanceof Error ? cause.constructor.name : 'Unknown';
    this.context = { ...context };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      pluginId: this.pluginId,
      causeType: this.causeType,
      context: this.context,
      timestamp: this.timestamp.toISOString()
    };
  }
}

export class ImportFailedError extends SwitchboardError {
  readonly code = ErrorCode.ImportFailed;
}

export class ContractViolationError extends SwitchboardError {
  readonly code = ErrorCode.ContractViolation;
}

export class InvalidManifestError extends SwitchboardError {
  readonly code = ErrorCode.InvalidManifest;
}

export class ConstructionFailedError extends SwitchboardError {
  readonly code = ErrorCode.ConstructionFailed;
}

export class InvalidConfigError extends SwitchboardError {
  readonly code = ErrorCode.InvalidConfig;
}

export class BackendFailureError extends SwitchboardError {
  readonly code = ErrorCode.BackendFailure;
}

export class NotFoundError extends SwitchboardError {
  readonly code = ErrorCode.NotFound;
}

export class InternalError extends SwitchboardError {
  readonly code = ErrorCode.Internal;
}

/**
 * Error factory for creating typed errors
 */
export class ErrorFactory {
  static create(
    code: ErrorCode,
    message: string,
    pluginId: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ): SwitchboardError {
    switch (code) {
      case ErrorCode.ImportFailed:
        return new ImportFailedError(message, pluginId, context, cause);
      case ErrorCode.ContractViolation:
        return new ContractViolationError(message, pluginId, context, cause);
      case ErrorCode.InvalidManifest:
        return new InvalidManifestError(message, pluginId, context, cause);
      case ErrorCode.ConstructionFailed:
        return new ConstructionFailedError(message, pluginId, context, cause);
      case ErrorCode.InvalidConfig:
        return new InvalidConfigError(message, pluginId, context, cause);
      case ErrorCode.BackendFailure:
        return new BackendFailureError(message, pluginId, context, cause);
      case ErrorCode.NotFound:
        return new NotFoundError(message, pluginId, context, cause);
      case ErrorCode.Internal:
      default:
        return new InternalError(message, pluginId, context, cause);
    }
  }

  /**
   * Wrap an arbitrary thrown value, keeping its message
   */
  static fromUnknown(
    code: ErrorCode,
    cause: unknown,
    pluginId: string,
    context: Record<string, unknown> = {}
  ): SwitchboardError {
    if (cause instanceof SwitchboardError) {
      return cause;
    }
    return ErrorFactory.create(code, ErrorFactory.messageOf(cause), pluginId, context, cause);
  }

  /**
   * Human-readable message for any thrown value
   */
  static messageOf(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    return String(error);
  }

  static getErrorCode(error: unknown): ErrorCode | null {
    if (error instanceof SwitchboardError) {
      return error.code;
    }
    return null;
  }
}
