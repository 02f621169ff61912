/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation. Sources are merged in
 * priority order (defaults, then an optional JSON file, then environment
 * variables) and the result is validated against {@link AppConfigSchema}.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { AppConfig, AppConfigSchema, PartialAppConfig } from './schema.js';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  /** Load configuration from this source */
  load(): Promise<PartialAppConfig>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively remove undefined values and empty sections
 */
function filterUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isPlainObject(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Deep merge two objects, with source overwriting target
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      deepMerge(targetValue, sourceValue);
    } else if (isPlainObject(sourceValue)) {
      const copy: Record<string, unknown> = {};
      deepMerge(copy, sourceValue);
      target[key] = copy;
    } else {
      target[key] = sourceValue;
    }
  }
}

function parseIntOrUndefined(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseBoolOrUndefined(value: string | undefined): boolean | undefined {
  return value ? value === 'true' : undefined;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Environment variable configuration source
 * Maps environment variables to configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<PartialAppConfig> {
    const env = this.env;

    return filterUndefined({
      env: env.NODE_ENV,
      data: {
        backend: env.DATA_BACKEND,
        postgres: {
          connectionString: env.DATABASE_URL,
          poolMax: parseIntOrUndefined(env.DB_POOL_MAX),
          idleTimeoutMillis: parseIntOrUndefined(env.DB_IDLE_TIMEOUT),
          connectionTimeoutMillis: parseIntOrUndefined(env.DB_CONNECTION_TIMEOUT),
        },
        sqlite: {
          filename: env.SQLITE_FILE,
        },
        mongodb: {
          uri: env.MONGODB_URI,
          database: env.MONGODB_DATABASE,
        },
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBoolOrUndefined(env.LOG_PRETTY),
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<PartialAppConfig> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        `Failed to load configuration file: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        'Configuration file must contain a JSON object'
      );
    }
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Environment to read variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Custom config sources; replaces the defaults */
  sources?: ConfigSource[];
}

/**
 * Formats zod issues as a single message
 */
export function formatConfigIssues(error: z.ZodError): string {
  return `Configuration validation failed:\n${
    error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n')
  }`;
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private readonly sources: ConfigSource[];
  private readonly logger = createModuleLogger('config-loader');

  constructor(options: ConfigLoaderOptions = {}) {
    const env = options.env ?? process.env;
    this.sources = options.sources ? [...options.sources] : [
      ...(env.CONFIG_FILE ? [new FileConfigSource(resolve(process.cwd(), env.CONFIG_FILE))] : []),
      new EnvironmentConfigSource(env),
    ];
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    const merged: PartialAppConfig = { data: { backend: 'sqlite' } };

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        this.logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }

      deepMerge(merged, await source.load());
      this.logger.debug({ source: source.name }, 'Loaded config from source');
    }

    const result = AppConfigSchema.safeParse(merged);

    if (!result.success) {
      throw new ConfigurationError('config', formatConfigIssues(result.error), {
        details: {
          issues: result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })),
        },
      });
    }

    this.logger.info(
      { env: result.data.env, backend: result.data.data.backend },
      'Configuration loaded successfully'
    );
    return result.data;
  }
}

/**
 * Load configuration with a single call
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  return new ConfigLoader(options).load();
}
