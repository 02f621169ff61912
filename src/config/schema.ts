/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating application configuration.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Backend Configuration
// ============================================================================

/**
 * Storage backends the persistence layer can run on
 */
export const DataBackend = z.enum(['postgres', 'sqlite', 'mongodb']);
export type DataBackend = z.infer<typeof DataBackend>;

/**
 * PostgreSQL configuration schema
 */
export const PostgresConfigSchema = z.object({
  /** Full connection string */
  connectionString: z.string().min(1),
  /** Maximum pool size */
  poolMax: z.coerce.number().int().min(1).default(20),
  /** Idle timeout in milliseconds */
  idleTimeoutMillis: z.coerce.number().int().min(0).default(30000),
  /** Connection timeout in milliseconds */
  connectionTimeoutMillis: z.coerce.number().int().min(0).default(5000),
});

export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

/**
 * SQLite configuration schema
 */
export const SqliteConfigSchema = z.object({
  /** Database file; ":memory:" for a private in-memory database */
  filename: z.string().min(1).default('weblog.db'),
});

export type SqliteConfig = z.infer<typeof SqliteConfigSchema>;

/**
 * MongoDB configuration schema
 */
export const MongoConfigSchema = z.object({
  /** Connection URI */
  uri: z.string().min(1),
  /** Database name */
  database: z.string().min(1).default('weblog'),
});

export type MongoConfig = z.infer<typeof MongoConfigSchema>;

/**
 * Data layer configuration; the section for the chosen backend is required
 */
export const DataConfigSchema = z.discriminatedUnion('backend', [
  z.object({ backend: z.literal('postgres'), postgres: PostgresConfigSchema }),
  z.object({ backend: z.literal('sqlite'), sqlite: SqliteConfigSchema.default({}) }),
  z.object({ backend: z.literal('mongodb'), mongodb: MongoConfigSchema }),
]);

export type DataConfig = z.infer<typeof DataConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Minimum level written */
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  /** Pretty-print through pino-pretty */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Application Configuration
// ============================================================================

/**
 * Complete application configuration schema
 */
export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  data: DataConfigSchema,
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Configuration as gathered from sources, before validation
 */
export type PartialAppConfig = Record<string, unknown>;
