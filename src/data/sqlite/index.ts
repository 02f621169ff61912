/**
 * SQLite Backend
 * @module data/sqlite
 */

import Database from 'better-sqlite3';
import { BackendUnavailableError } from '../../errors/index.js';
import { createModuleLogger } from '../../logging/index.js';
import type { SqliteConfig } from '../../config/index.js';
import type { IData } from '../interfaces.js';
import { ensureSqliteTables } from './schema.js';
import { SqliteCategoryData } from './category-data.js';
import { SqlitePageData } from './page-data.js';
import { SqlitePostData } from './post-data.js';
import { SqliteTagMapData } from './tag-map-data.js';
import { SqliteThemeData } from './theme-data.js';
import { SqliteThemeAssetData } from './theme-asset-data.js';
import { SqliteUploadData } from './upload-data.js';
import { SqliteWebLogData } from './web-log-data.js';
import { SqliteWebLogUserData } from './web-log-user-data.js';

/**
 * Persistence on a single SQLite database file
 */
export class SqliteData implements IData {
  readonly backend = 'sqlite';
  readonly category: SqliteCategoryData;
  readonly page: SqlitePageData;
  readonly post: SqlitePostData;
  readonly tagMap: SqliteTagMapData;
  readonly theme: SqliteThemeData;
  readonly themeAsset: SqliteThemeAssetData;
  readonly upload: SqliteUploadData;
  readonly webLog: SqliteWebLogData;
  readonly webLogUser: SqliteWebLogUserData;
  private readonly logger = createModuleLogger('sqlite');

  constructor(private readonly db: Database.Database) {
    this.category = new SqliteCategoryData(db);
    this.page = new SqlitePageData(db);
    this.post = new SqlitePostData(db);
    this.tagMap = new SqliteTagMapData(db);
    this.theme = new SqliteThemeData(db);
    this.themeAsset = new SqliteThemeAssetData(db);
    this.upload = new SqliteUploadData(db);
    this.webLog = new SqliteWebLogData(db);
    this.webLogUser = new SqliteWebLogUserData(db);
  }

  /**
   * Open (or create) the configured database file
   */
  static open(config: SqliteConfig): SqliteData {
    let db: Database.Database;
    try {
      db = new Database(config.filename);
    } catch (error) {
      throw new BackendUnavailableError('sqlite', config.filename, error);
    }
    db.pragma('journal_mode = WAL');
    const data = new SqliteData(db);
    data.logger.backendConnected('sqlite', config.filename);
    return data;
  }

  async startUp(): Promise<void> {
    const created = ensureSqliteTables(this.db, this.logger);
    if (created.length > 0) {
      this.logger.info({ tables: created }, 'SQLite tables created');
    }
  }

  async close(): Promise<void> {
    this.db.close();
    this.logger.backendClosed('sqlite');
  }
}

export { ensureSqliteTables, SQLITE_TABLES } from './schema.js';
