/**
 * PostgreSQL Theme Asset Store
 * @module data/postgres/theme-asset-data
 */

import type pg from 'pg';
import { splitThemeAssetId, themeAssetId, type ThemeAssetId, type ThemeId } from '../../types/ids.js';
import type { ThemeAsset } from '../../types/entities.js';
import type { IThemeAssetData } from '../interfaces.js';
import { PgStore } from './pg-store.js';

interface AssetRow {
  theme_id: ThemeId;
  path: string;
  updated_on: Date;
  data?: Buffer;
}

function rowToAsset(row: AssetRow): ThemeAsset {
  return {
    id: themeAssetId(row.theme_id, row.path),
    updatedOn: row.updated_on,
    data: row.data ?? Buffer.alloc(0),
  };
}

const ORDER = "ORDER BY theme_id || '/' || path";

/**
 * PostgreSQL implementation of {@link IThemeAssetData}
 */
export class PgThemeAssetData extends PgStore implements IThemeAssetData {
  constructor(pool: pg.Pool) {
    super(pool, 'theme_asset');
  }

  async all(): Promise<ThemeAsset[]> {
    const rows = await this.queryAll<AssetRow>(`SELECT theme_id, path, updated_on FROM theme_asset ${ORDER}`);
    return rows.map(rowToAsset);
  }

  async deleteByTheme(themeId: ThemeId): Promise<void> {
    await this.execute('DELETE FROM theme_asset WHERE theme_id = $1', [themeId]);
  }

  async findById(assetId: ThemeAssetId): Promise<ThemeAsset | undefined> {
    const { themeId, path } = splitThemeAssetId(assetId);
    const row = await this.queryOne<AssetRow>(
      'SELECT * FROM theme_asset WHERE theme_id = $1 AND path = $2', [themeId, path]);
    return row && rowToAsset(row);
  }

  async findByTheme(themeId: ThemeId): Promise<ThemeAsset[]> {
    const rows = await this.queryAll<AssetRow>(
      `SELECT theme_id, path, updated_on FROM theme_asset WHERE theme_id = $1 ${ORDER}`, [themeId]);
    return rows.map(rowToAsset);
  }

  async findByThemeWithData(themeId: ThemeId): Promise<ThemeAsset[]> {
    const rows = await this.queryAll<AssetRow>(
      `SELECT * FROM theme_asset WHERE theme_id = $1 ${ORDER}`, [themeId]);
    return rows.map(rowToAsset);
  }

  async save(asset: ThemeAsset): Promise<void> {
    const { themeId, path } = splitThemeAssetId(asset.id);
    await this.execute(
      `INSERT INTO theme_asset (theme_id, path, updated_on, data) VALUES ($1, $2, $3, $4)
       ON CONFLICT (theme_id, path) DO UPDATE SET
         updated_on = EXCLUDED.updated_on,
         data       = EXCLUDED.data`,
      [themeId, path, asset.updatedOn, asset.data]
    );
  }
}
