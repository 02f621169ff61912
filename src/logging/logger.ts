/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the web log persistence core.
 * Includes domain-specific logging methods for backends, caches and
 * backup/restore.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  webLogId?: string;
  operation?: string;
  backend?: string;
  module?: string;
  service?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  withContext(context: LogContext): StructuredLogger;

  // Backend lifecycle
  backendConnected(backend: string, target: string): void;
  backendClosed(backend: string): void;
  tableCreated(backend: string, name: string): void;

  // Cache lifecycle
  cacheFilled(cache: string, entries: number, duration: number): void;
  cacheRefreshed(cache: string, key: string, duration: number): void;
  cacheRefreshFailed(cache: string, key: string, error: unknown): void;
  cacheInvalidated(cache: string, key: string): void;

  // Backup and restore
  backupCreated(webLogId: string, counts: Record<string, number>): void;
  restoreStepCompleted(webLogId: string, step: string, count: number): void;
  restoreCompleted(webLogId: string, duration: number): void;

  // Performance methods
  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
  redact: [
    'password',
    'passwordHash',
    'password_hash',
    'connectionString',
    'uri',
    'secret',
  ],
  service: process.env.SERVICE_NAME || 'inkwell-data',
  version: process.env.SERVICE_VERSION || '1.0.0',
  environment: process.env.NODE_ENV || 'development',
};

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands each sensitive key to its nested variations
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
    expandedPaths.push(`[*].${path}`);
  }

  return expandedPaths;
}

/**
 * Removes credentials from a connection URL
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      parsed.username = '[REDACTED]';
      parsed.password = '';
    }
    return parsed.toString();
  } catch {
    return url.replace(/\/\/[^:]+:[^@]+@/, '//[REDACTED]@');
  }
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    backendConnected(backend: string, target: string) {
      logger.info(
        { event: 'backend_connected', backend, target: sanitizeUrl(target) },
        `Connected to ${backend} backend`
      );
    },

    backendClosed(backend: string) {
      logger.info({ event: 'backend_closed', backend }, `Closed ${backend} backend`);
    },

    tableCreated(backend: string, name: string) {
      logger.info(
        { event: 'table_created', backend, table: name },
        `Created ${name} (${backend})`
      );
    },

    cacheFilled(cache: string, entries: number, duration: number) {
      logger.info(
        { event: 'cache_filled', cache, entries, durationMs: duration },
        `${cache} filled with ${entries} entries in ${duration}ms`
      );
    },

    cacheRefreshed(cache: string, key: string, duration: number) {
      logger.debug(
        { event: 'cache_refreshed', cache, key, durationMs: duration },
        `${cache} refreshed ${key} in ${duration}ms`
      );
    },

    cacheRefreshFailed(cache: string, key: string, error: unknown) {
      logger.error(
        { event: 'cache_refresh_failed', cache, key, err: error },
        `${cache} failed to refresh ${key}`
      );
    },

    cacheInvalidated(cache: string, key: string) {
      logger.debug({ event: 'cache_invalidated', cache, key }, `${cache} invalidated ${key}`);
    },

    backupCreated(webLogId: string, counts: Record<string, number>) {
      logger.info(
        { event: 'backup_created', webLogId, ...counts },
        `Backup created for web log ${webLogId}`
      );
    },

    restoreStepCompleted(webLogId: string, step: string, count: number) {
      logger.info(
        { event: 'restore_step_completed', webLogId, step, count },
        `Restored ${count} ${step}`
      );
    },

    restoreCompleted(webLogId: string, duration: number) {
      logger.info(
        { event: 'restore_completed', webLogId, durationMs: duration },
        `Restore of web log ${webLogId} completed in ${duration}ms`
      );
    },

    performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>) {
      logger.debug(
        { event: 'performance_metric', operation, durationMs: duration, ...metadata },
        `${operation}: ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<Pick<LoggerConfig, 'level' | 'pretty'>> = {}
): StructuredLogger {
  const config: LoggerConfig = { ...defaultConfig, ...overrides };

  if (process.env.LOG_LEVEL && overrides.level === undefined) {
    config.level = process.env.LOG_LEVEL;
  }

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('inkwell-data');
  }
  return rootLogger;
}

/**
 * Replaces the root logger, applying level and pretty-printing from config
 */
export function initLogger(
  overrides: Partial<Pick<LoggerConfig, 'level' | 'pretty'>> = {},
  context?: LogContext
): StructuredLogger {
  rootLogger = createLogger('inkwell-data', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export async function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  try {
    const result = await fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
