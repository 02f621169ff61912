/**
 * MongoDB Backend
 * @module data/mongo
 */

import { createModuleLogger } from '../../logging/index.js';
import type { MongoConfig } from '../../config/index.js';
import type { IData } from '../interfaces.js';
import { connectMongo, type DocumentDatabase, type DocumentSort } from './collections.js';
import { Collections, type CollectionName } from './mongo-store.js';
import { MongoCategoryData } from './category-data.js';
import { MongoPageData } from './page-data.js';
import { MongoPostData } from './post-data.js';
import { MongoTagMapData } from './tag-map-data.js';
import { MongoThemeData } from './theme-data.js';
import { MongoThemeAssetData } from './theme-asset-data.js';
import { MongoUploadData } from './upload-data.js';
import { MongoWebLogData } from './web-log-data.js';
import { MongoWebLogUserData } from './web-log-user-data.js';

interface IndexDefinition {
  readonly keys: DocumentSort;
  readonly unique?: boolean;
}

/**
 * Secondary indexes per collection; `_id` is always indexed
 */
export const MONGO_INDEXES: Readonly<Record<CollectionName, readonly IndexDefinition[]>> = {
  [Collections.CATEGORY]: [{ keys: { webLogId: 1, nameSort: 1 } }],
  [Collections.PAGE]: [
    { keys: { webLogId: 1, permalink: 1 } },
    { keys: { webLogId: 1, titleSort: 1 } },
    { keys: { priorPermalinks: 1 } },
    { keys: { authorId: 1 } },
  ],
  [Collections.POST]: [
    { keys: { webLogId: 1, permalink: 1 } },
    { keys: { webLogId: 1, status: 1, publishedOn: -1 } },
    { keys: { priorPermalinks: 1 } },
    { keys: { categoryIds: 1 } },
    { keys: { tags: 1 } },
    { keys: { authorId: 1 } },
  ],
  [Collections.TAG_MAP]: [{ keys: { webLogId: 1, tag: 1 } }, { keys: { webLogId: 1, urlValue: 1 } }],
  [Collections.THEME]: [],
  [Collections.THEME_ASSET]: [{ keys: { themeId: 1 } }],
  [Collections.UPLOAD]: [{ keys: { webLogId: 1, path: 1 } }],
  [Collections.WEB_LOG]: [{ keys: { urlBase: 1 }, unique: true }],
  [Collections.WEB_LOG_USER]: [{ keys: { webLogId: 1, email: 1 } }],
};

/**
 * Persistence on a MongoDB database
 */
export class MongoData implements IData {
  readonly backend = 'mongodb';
  readonly category: MongoCategoryData;
  readonly page: MongoPageData;
  readonly post: MongoPostData;
  readonly tagMap: MongoTagMapData;
  readonly theme: MongoThemeData;
  readonly themeAsset: MongoThemeAssetData;
  readonly upload: MongoUploadData;
  readonly webLog: MongoWebLogData;
  readonly webLogUser: MongoWebLogUserData;
  private readonly logger = createModuleLogger('mongodb');

  constructor(private readonly db: DocumentDatabase) {
    this.category = new MongoCategoryData(db);
    this.page = new MongoPageData(db);
    this.post = new MongoPostData(db);
    this.tagMap = new MongoTagMapData(db);
    this.theme = new MongoThemeData(db);
    this.themeAsset = new MongoThemeAssetData(db);
    this.upload = new MongoUploadData(db);
    this.webLog = new MongoWebLogData(db);
    this.webLogUser = new MongoWebLogUserData(db);
  }

  static async connect(config: MongoConfig): Promise<MongoData> {
    return new MongoData(await connectMongo(config));
  }

  /**
   * Create missing collections, then every index; creating an index that
   * already exists changes nothing
   */
  async startUp(): Promise<void> {
    const existing = new Set(await this.db.collectionNames());
    const created: string[] = [];
    for (const name of Object.values(Collections)) {
      if (!existing.has(name)) {
        await this.db.createCollection(name);
        this.logger.tableCreated('mongodb', name);
        created.push(name);
      }
      for (const index of MONGO_INDEXES[name]) {
        await this.db.collection(name).createIndex(index.keys, { unique: index.unique });
      }
    }
    if (created.length > 0) {
      this.logger.info({ collections: created }, 'MongoDB collections created');
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

export type { DocumentCollection, DocumentDatabase } from './collections.js';
export { Collections } from './mongo-store.js';
