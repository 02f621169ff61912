/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 *
 * Storage backend and configuration failures.
 */

import { BaseError, ErrorContext, getErrorMessage } from './base.js';
import { ErrorCode, DataErrorCodes, ConfigErrorCodes } from './codes.js';

// ============================================================================
// Database Errors
// ============================================================================

/**
 * Base class for storage-backend errors
 */
export class DatabaseError extends BaseError {
  public readonly operation: string;

  constructor(
    message: string,
    operation: string,
    code: ErrorCode = DataErrorCodes.DATABASE_ERROR,
    context: ErrorContext = {}
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
    this.operation = operation;
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends DatabaseError {
  public readonly target: string;

  constructor(
    target: string,
    context: ErrorContext = {},
    code: ErrorCode = DataErrorCodes.CONNECTION_ERROR
  ) {
    super(
      `Failed to connect to database: ${target}`,
      'connect',
      code,
      context
    );
    this.name = 'ConnectionError';
    this.target = target;
  }
}

/**
 * The configured backend could not be reached at startup
 */
export class BackendUnavailableError extends ConnectionError {
  public readonly backend: string;

  constructor(backend: string, target: string, cause: unknown) {
    super(target, { cause, details: { backend, reason: getErrorMessage(cause) } },
      DataErrorCodes.BACKEND_UNAVAILABLE);
    this.name = 'BackendUnavailableError';
    this.backend = backend;
  }
}

/**
 * Database query error
 */
export class QueryError extends DatabaseError {
  public readonly query?: string;

  constructor(
    message: string,
    query?: string,
    context: ErrorContext = {}
  ) {
    super(message, 'query', DataErrorCodes.QUERY_ERROR, context);
    this.name = 'QueryError';
    // Keep statements short in logs
    this.query = query?.substring(0, 200);
  }
}

/**
 * Table, collection or index creation failed
 */
export class SchemaError extends DatabaseError {
  public readonly objectName: string;

  constructor(objectName: string, context: ErrorContext = {}) {
    super(
      `Failed to create ${objectName}`,
      'schema',
      DataErrorCodes.SCHEMA_ERROR,
      context
    );
    this.name = 'SchemaError';
    this.objectName = objectName;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(configKey: string, message: string, context: ErrorContext = {}) {
    super(message, ConfigErrorCodes.CONFIGURATION_ERROR, context);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}
