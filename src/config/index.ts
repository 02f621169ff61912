/**
 * Configuration Module
 * @module config
 */

export {
  Environment,
  DataBackend,
  PostgresConfigSchema,
  SqliteConfigSchema,
  MongoConfigSchema,
  DataConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
} from './schema.js';

export type {
  PostgresConfig,
  SqliteConfig,
  MongoConfig,
  DataConfig,
  LoggingConfig,
  AppConfig,
  PartialAppConfig,
} from './schema.js';

export {
  EnvironmentConfigSource,
  FileConfigSource,
  ConfigLoader,
  formatConfigIssues,
  loadConfig,
} from './loader.js';

export type { ConfigSource, ConfigLoaderOptions } from './loader.js';
