/**
 * MongoDB Theme Asset Store
 * @module data/mongo/theme-asset-data
 *
 * Asset documents keep their theme ID and path beside the combined ID so
 * a theme's assets can be found and deleted together.
 */

import { splitThemeAssetId, type ThemeAssetId, type ThemeId } from '../../types/ids.js';
import { ThemeAssetSchema, type ThemeAsset } from '../../types/entities.js';
import type { IThemeAssetData } from '../interfaces.js';
import type { DocumentDatabase, DocumentProjection } from './collections.js';
import { Collections, MongoStore } from './mongo-store.js';

const WITHOUT_DATA: DocumentProjection = { data: 0 };
const NO_DATA = { data: Buffer.alloc(0) };
const BY_ID = { _id: 1 } as const;

/**
 * MongoDB implementation of {@link IThemeAssetData}
 */
export class MongoThemeAssetData extends MongoStore implements IThemeAssetData {
  constructor(db: DocumentDatabase) {
    super(db, Collections.THEME_ASSET);
  }

  async all(): Promise<ThemeAsset[]> {
    const documents = await this.collection.find({}, { sort: BY_ID, projection: WITHOUT_DATA });
    return this.parseAll(ThemeAssetSchema, documents, NO_DATA);
  }

  async deleteByTheme(themeId: ThemeId): Promise<void> {
    await this.collection.deleteMany({ themeId });
  }

  async findById(assetId: ThemeAssetId): Promise<ThemeAsset | undefined> {
    const document = await this.collection.findOne({ _id: assetId });
    return document && this.parse(ThemeAssetSchema, document);
  }

  async findByTheme(themeId: ThemeId): Promise<ThemeAsset[]> {
    const documents = await this.collection.find({ themeId }, { sort: BY_ID, projection: WITHOUT_DATA });
    return this.parseAll(ThemeAssetSchema, documents, NO_DATA);
  }

  async findByThemeWithData(themeId: ThemeId): Promise<ThemeAsset[]> {
    return this.parseAll(ThemeAssetSchema, await this.collection.find({ themeId }, { sort: BY_ID }));
  }

  async save(asset: ThemeAsset): Promise<void> {
    const { themeId, path } = splitThemeAssetId(asset.id);
    await this.collection.upsert(
      { _id: asset.id },
      { _id: asset.id, themeId, path, updatedOn: asset.updatedOn, data: asset.data }
    );
  }
}
