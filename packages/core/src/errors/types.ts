// ============================================
// Logfan Error Types
// ============================================

import { ErrorCode, isConfigurationCode } from "@logfan/shared";

/**
 * Options for creating a LogfanError.
 */
export interface LogfanErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all logfan errors.
 *
 * Provides:
 * - Categorized error codes
 * - Error cause chaining
 * - Additional context
 */
export class LogfanError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: LogfanErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "LogfanError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Raised synchronously when a destination is constructed, or a logger setting
 * is changed, with invalid input. Never deferred to write time.
 */
export class ConfigurationError extends LogfanError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    options?: LogfanErrorOptions
  ) {
    super(message, code, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Anything that went wrong inside a destination's write during dispatch.
 * Only ever handed to a logger's `onWriteFailure` hook; never thrown to the
 * logging caller.
 */
export class WriteFailure extends LogfanError {
  /** Identifier of the destination whose write failed, when known */
  public readonly destinationId?: string;

  constructor(
    message: string,
    options?: LogfanErrorOptions & { destinationId?: string; timedOut?: boolean }
  ) {
    super(message, options?.timedOut ? ErrorCode.WRITE_TIMEOUT : ErrorCode.WRITE_FAILED, options);
    this.name = "WriteFailure";
    this.destinationId = options?.destinationId;
  }

  /**
   * Wrap an arbitrary thrown value.
   */
  static from(error: unknown, destinationId?: string): WriteFailure {
    if (error instanceof WriteFailure) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new WriteFailure(message, { cause: error, destinationId });
  }

  get timedOut(): boolean {
    return this.code === ErrorCode.WRITE_TIMEOUT;
  }
}

/**
 * Type guard for configuration errors, including ones built directly on
 * LogfanError with a configuration code.
 */
export function isConfigurationError(error: unknown): error is LogfanError {
  return error instanceof LogfanError && isConfigurationCode(error.code);
}

export function isWriteFailure(error: unknown): error is WriteFailure {
  return error instanceof WriteFailure;
}
