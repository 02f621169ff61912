/**
 * PostgreSQL Backend
 * @module data/postgres
 */

import type pg from 'pg';
import { createModuleLogger } from '../../logging/index.js';
import type { PostgresConfig } from '../../config/index.js';
import type { IData } from '../interfaces.js';
import { checkConnection, closePool, createPool } from './connection.js';
import { ensurePostgresTables } from './schema.js';
import { PgCategoryData } from './category-data.js';
import { PgPageData } from './page-data.js';
import { PgPostData } from './post-data.js';
import { PgTagMapData } from './tag-map-data.js';
import { PgThemeData } from './theme-data.js';
import { PgThemeAssetData } from './theme-asset-data.js';
import { PgUploadData } from './upload-data.js';
import { PgWebLogData } from './web-log-data.js';
import { PgWebLogUserData } from './web-log-user-data.js';

/**
 * Persistence on a PostgreSQL database through a connection pool
 */
export class PostgresData implements IData {
  readonly backend = 'postgres';
  readonly category: PgCategoryData;
  readonly page: PgPageData;
  readonly post: PgPostData;
  readonly tagMap: PgTagMapData;
  readonly theme: PgThemeData;
  readonly themeAsset: PgThemeAssetData;
  readonly upload: PgUploadData;
  readonly webLog: PgWebLogData;
  readonly webLogUser: PgWebLogUserData;
  private readonly logger = createModuleLogger('postgres');

  constructor(
    private readonly pool: pg.Pool,
    private readonly config: PostgresConfig
  ) {
    this.category = new PgCategoryData(pool);
    this.page = new PgPageData(pool);
    this.post = new PgPostData(pool);
    this.tagMap = new PgTagMapData(pool);
    this.theme = new PgThemeData(pool);
    this.themeAsset = new PgThemeAssetData(pool);
    this.upload = new PgUploadData(pool);
    this.webLog = new PgWebLogData(pool);
    this.webLogUser = new PgWebLogUserData(pool);
  }

  static open(config: PostgresConfig): PostgresData {
    return new PostgresData(createPool(config), config);
  }

  async startUp(): Promise<void> {
    await checkConnection(this.pool, this.config);
    const created = await ensurePostgresTables(this.pool, this.logger);
    if (created.length > 0) {
      this.logger.info({ tables: created }, 'PostgreSQL tables created');
    }
  }

  async close(): Promise<void> {
    await closePool(this.pool);
  }
}

export { ensurePostgresTables, POSTGRES_TABLES } from './schema.js';
