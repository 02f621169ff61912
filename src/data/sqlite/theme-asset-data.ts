/**
 * SQLite Theme Asset Store
 * @module data/sqlite/theme-asset-data
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ThemeId, splitThemeAssetId, themeAssetId, type ThemeAssetId } from '../../types/ids.js';
import type { ThemeAsset } from '../../types/entities.js';
import type { IThemeAssetData } from '../interfaces.js';
import { SqliteStore, sqlBlob, sqlDate } from './sqlite-store.js';

const AssetRow = z.object({
  theme_id: ThemeId,
  path: z.string(),
  updated_on: sqlDate,
  data: sqlBlob.optional(),
}).transform((row): ThemeAsset => ({
  id: themeAssetId(row.theme_id, row.path),
  updatedOn: row.updated_on,
  data: row.data ?? Buffer.alloc(0),
}));

const ORDER = "ORDER BY theme_id || '/' || path";

/**
 * SQLite implementation of {@link IThemeAssetData}
 */
export class SqliteThemeAssetData extends SqliteStore implements IThemeAssetData {
  constructor(db: Database.Database) {
    super(db, 'theme_asset');
  }

  async all(): Promise<ThemeAsset[]> {
    return this.queryAll(AssetRow, `SELECT theme_id, path, updated_on FROM theme_asset ${ORDER}`);
  }

  async deleteByTheme(themeId: ThemeId): Promise<void> {
    this.execute('DELETE FROM theme_asset WHERE theme_id = @themeId', { themeId });
  }

  async findById(assetId: ThemeAssetId): Promise<ThemeAsset | undefined> {
    const { themeId, path } = splitThemeAssetId(assetId);
    return this.queryOne(AssetRow,
      'SELECT * FROM theme_asset WHERE theme_id = @themeId AND path = @path',
      { themeId, path });
  }

  async findByTheme(themeId: ThemeId): Promise<ThemeAsset[]> {
    return this.queryAll(AssetRow,
      `SELECT theme_id, path, updated_on FROM theme_asset WHERE theme_id = @themeId ${ORDER}`,
      { themeId });
  }

  async findByThemeWithData(themeId: ThemeId): Promise<ThemeAsset[]> {
    return this.queryAll(AssetRow,
      `SELECT * FROM theme_asset WHERE theme_id = @themeId ${ORDER}`,
      { themeId });
  }

  async save(asset: ThemeAsset): Promise<void> {
    const { themeId, path } = splitThemeAssetId(asset.id);
    this.execute(
      `INSERT INTO theme_asset (theme_id, path, updated_on, data)
       VALUES (@themeId, @path, @updatedOn, @data)
       ON CONFLICT (theme_id, path) DO UPDATE SET
         updated_on = excluded.updated_on,
         data       = excluded.data`,
      { themeId, path, updatedOn: asset.updatedOn.toISOString(), data: asset.data }
    );
  }
}
