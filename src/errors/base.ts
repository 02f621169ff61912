/**
 * Base Error Classes
 * @module errors/base
 *
 * Root of the error hierarchy thrown by the backends, the caches and the
 * backup service. Every error carries a code, the context it failed in and,
 * where there was one, the error that caused it.
 */

import { ErrorCode, ErrorCodes } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: unknown;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  timestamp?: Date;
  /** Web log the failing operation was scoped to */
  webLogId?: string;
  operation?: string;
  resource?: string;
}

/**
 * Serialized error format, as written to logs
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  timestamp: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context: ErrorContext;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

/**
 * Carries a foreign error or thrown value inside the hierarchy
 */
class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context);
    this.name = 'WrappedError';
  }
}

/**
 * Wrap an unknown error into a BaseError; application errors pass through
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = ErrorCodes.INTERNAL_ERROR
): BaseError {
  if (isBaseError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, {
    details: { originalValue: error },
  });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
