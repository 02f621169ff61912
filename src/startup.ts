/**
 * Startup Sequence
 * @module startup
 *
 * connect -> create missing tables -> fill the web log cache -> fill the
 * theme asset cache. Page lists and categories load per web log on first
 * use. Any failure stops startup; the backend is closed before the error is
 * rethrown.
 */

import { loadConfig, type AppConfig } from './config/index.js';
import { createModuleLogger, initLogger, withLogging } from './logging/index.js';
import { createData } from './data/factory.js';
import type { IData } from './data/interfaces.js';
import { AppCaches, sourceCompiler } from './cache/app-caches.js';
import { wrapError } from './errors/index.js';
import type { TemplateCompiler } from './cache/template-cache.js';

export interface StartUpOptions<T> {
  /** Configuration to use instead of loading it */
  config?: AppConfig;
  /** Backend to use instead of creating one from the configuration */
  data?: IData;
  compiler?: TemplateCompiler<T>;
}

export interface Application<T> {
  config: AppConfig;
  data: IData;
  caches: AppCaches<T>;
}

export async function startUp(options?: StartUpOptions<string>): Promise<Application<string>>;
export async function startUp<T>(
  options: StartUpOptions<T> & { compiler: TemplateCompiler<T> }
): Promise<Application<T>>;
export async function startUp(options: StartUpOptions<unknown> = {}): Promise<Application<unknown>> {
  const config = options.config ?? await loadConfig();
  initLogger({ level: config.logging.level, pretty: config.logging.pretty });
  const logger = createModuleLogger('startup');

  const data = options.data ?? await createData(config.data);
  try {
    await withLogging(logger, 'startup.tables', () => data.startUp());

    const caches = new AppCaches(data, options.compiler ?? sourceCompiler);
    await withLogging(logger, 'startup.webLogCache', () => caches.webLogs.fill());
    await withLogging(logger, 'startup.themeAssetCache', () => caches.themeAssets.fill());

    logger.info(
      { backend: data.backend, webLogs: caches.webLogs.all().length },
      'Persistence layer ready'
    );
    return { config, data, caches };
  } catch (error) {
    const failure = wrapError(error);
    logger.fatal({ err: failure, code: failure.code, backend: data.backend }, 'Startup failed');
    await data.close();
    throw failure;
  }
}
