/**
 * Document Store Port
 * @module data/mongo/collections
 *
 * The narrow slice of the MongoDB driver the document adapter uses. The
 * production implementation wraps a connected `MongoClient`; tests provide an
 * in-process implementation of the same interfaces.
 */

import { MongoClient, type Collection, type Db, type Document, type Filter, type UpdateFilter } from 'mongodb';
import { BackendUnavailableError, QueryError, getErrorMessage } from '../../errors/index.js';
import { createModuleLogger } from '../../logging/index.js';
import type { MongoConfig } from '../../config/index.js';

// ============================================================================
// Port
// ============================================================================

/**
 * Every stored document is keyed by its entity's string ID
 */
export interface StoredDocument extends Document {
  _id: string;
}

export type DocumentFilter = Filter<StoredDocument>;
export type DocumentUpdate = UpdateFilter<StoredDocument>;

/**
 * Sort keys in priority order
 */
export type DocumentSort = Record<string, 1 | -1>;

/**
 * Top-level fields to include (1) or exclude (0)
 */
export type DocumentProjection = Record<string, 0 | 1>;

export interface FindOptions {
  readonly sort?: DocumentSort;
  readonly skip?: number;
  readonly limit?: number;
  readonly projection?: DocumentProjection;
}

export interface DocumentCollection {
  findOne(filter: DocumentFilter, options?: FindOptions): Promise<StoredDocument | undefined>;
  find(filter: DocumentFilter, options?: FindOptions): Promise<StoredDocument[]>;
  countDocuments(filter: DocumentFilter): Promise<number>;
  /**
   * Insert a new document; an `_id` already present fails with a
   * {@link QueryError} caused by a duplicate key error
   */
  insertOne(document: StoredDocument): Promise<void>;
  /** Replace the matching document, inserting it when none matches */
  upsert(filter: DocumentFilter, document: StoredDocument): Promise<void>;
  /** Number of matched documents */
  updateOne(filter: DocumentFilter, update: DocumentUpdate): Promise<number>;
  updateMany(filter: DocumentFilter, update: DocumentUpdate): Promise<number>;
  /** Number of deleted documents */
  deleteOne(filter: DocumentFilter): Promise<number>;
  deleteMany(filter: DocumentFilter): Promise<number>;
  createIndex(keys: DocumentSort, options?: { unique?: boolean }): Promise<void>;
}

export interface DocumentDatabase {
  collection(name: string): DocumentCollection;
  collectionNames(): Promise<string[]>;
  createCollection(name: string): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// MongoDB Driver Implementation
// ============================================================================

class MongoDocumentCollection implements DocumentCollection {
  private readonly logger = createModuleLogger('mongodb');

  constructor(private readonly collection: Collection<StoredDocument>) {}

  private async measure<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.logger.trace(
        { duration: Date.now() - start, collection: this.collection.collectionName, operation },
        'Query executed'
      );
      return result;
    } catch (error) {
      this.logger.error({ err: error, collection: this.collection.collectionName, operation }, 'Query failed');
      throw new QueryError(getErrorMessage(error), `${this.collection.collectionName}.${operation}`, {
        cause: error,
      });
    }
  }

  async findOne(filter: DocumentFilter, options: FindOptions = {}): Promise<StoredDocument | undefined> {
    const found = await this.measure('findOne', () => this.collection.findOne(filter, options));
    return found ?? undefined;
  }

  async find(filter: DocumentFilter, options: FindOptions = {}): Promise<StoredDocument[]> {
    return this.measure('find', () => this.collection.find(filter, options).toArray());
  }

  async countDocuments(filter: DocumentFilter): Promise<number> {
    return this.measure('countDocuments', () => this.collection.countDocuments(filter));
  }

  async insertOne(document: StoredDocument): Promise<void> {
    await this.measure('insertOne', () => this.collection.insertOne(document));
  }

  async upsert(filter: DocumentFilter, document: StoredDocument): Promise<void> {
    await this.measure('replaceOne', () => this.collection.replaceOne(filter, document, { upsert: true }));
  }

  async updateOne(filter: DocumentFilter, update: DocumentUpdate): Promise<number> {
    const result = await this.measure('updateOne', () => this.collection.updateOne(filter, update));
    return result.matchedCount;
  }

  async updateMany(filter: DocumentFilter, update: DocumentUpdate): Promise<number> {
    const result = await this.measure('updateMany', () => this.collection.updateMany(filter, update));
    return result.matchedCount;
  }

  async deleteOne(filter: DocumentFilter): Promise<number> {
    const result = await this.measure('deleteOne', () => this.collection.deleteOne(filter));
    return result.deletedCount;
  }

  async deleteMany(filter: DocumentFilter): Promise<number> {
    const result = await this.measure('deleteMany', () => this.collection.deleteMany(filter));
    return result.deletedCount;
  }

  async createIndex(keys: DocumentSort, options: { unique?: boolean } = {}): Promise<void> {
    await this.measure('createIndex', () => this.collection.createIndex(keys, options));
  }
}

class MongoDocumentDatabase implements DocumentDatabase {
  private readonly logger = createModuleLogger('mongodb');

  constructor(
    private readonly client: MongoClient,
    private readonly db: Db
  ) {}

  collection(name: string): DocumentCollection {
    return new MongoDocumentCollection(this.db.collection<StoredDocument>(name));
  }

  async collectionNames(): Promise<string[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((collection) => collection.name);
  }

  async createCollection(name: string): Promise<void> {
    await this.db.createCollection(name);
  }

  async close(): Promise<void> {
    await this.client.close();
    this.logger.backendClosed('mongodb');
  }
}

/**
 * Connect one long-lived client to the configured server
 */
export async function connectMongo(config: MongoConfig): Promise<DocumentDatabase> {
  const client = new MongoClient(config.uri, {
    ignoreUndefined: true,
    promoteBuffers: true,
  });
  try {
    await client.connect();
  } catch (error) {
    throw new BackendUnavailableError('mongodb', config.uri, error);
  }
  createModuleLogger('mongodb').backendConnected('mongodb', config.uri);
  return new MongoDocumentDatabase(client, client.db(config.database));
}
