/**
 * MongoDB Store Base
 * @module data/mongo/mongo-store
 *
 * Entities are stored with their ID as `_id`; every document read back is
 * validated against the entity's schema, which also drops storage-only fields
 * such as sort keys.
 */

import type { Document } from 'mongodb';
import { z } from 'zod';
import { QueryError } from '../../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../../logging/index.js';
import type { DocumentCollection, DocumentDatabase, DocumentUpdate, StoredDocument } from './collections.js';

/**
 * Entity schema: validates a document and produces its domain shape
 */
export type EntitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Collection names
 */
export const Collections = {
  CATEGORY: 'category',
  PAGE: 'page',
  POST: 'post',
  TAG_MAP: 'tag_map',
  THEME: 'theme',
  THEME_ASSET: 'theme_asset',
  UPLOAD: 'upload',
  WEB_LOG: 'web_log',
  WEB_LOG_USER: 'web_log_user',
} as const;

export type CollectionName = typeof Collections[keyof typeof Collections];

/**
 * Document for an entity: its ID becomes `_id`
 */
export function toDocument(entity: { id: string }): StoredDocument {
  const { id, ...fields } = entity;
  return { _id: id, ...fields };
}

/**
 * `$set` for the defined fields and `$unset` for the undefined ones, since
 * the client drops undefined values instead of clearing them
 */
export function setFields(fields: Record<string, unknown>): DocumentUpdate {
  const set: Document = {};
  const unset: Document = {};
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) unset[name] = '';
    else set[name] = value;
  }
  return Object.keys(unset).length > 0 ? { $set: set, $unset: unset } : { $set: set };
}

export abstract class MongoStore {
  protected readonly collection: DocumentCollection;
  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly db: DocumentDatabase,
    protected readonly collectionName: CollectionName
  ) {
    this.collection = db.collection(collectionName);
    this.logger = createModuleLogger(`mongodb:${collectionName}`);
  }

  /**
   * Map a document to its entity; `defaults` fill fields a projection left out
   */
  protected parse<T>(schema: EntitySchema<T>, document: Document, defaults: Document = {}): T {
    const { _id, ...fields } = document;
    const result = schema.safeParse({ ...defaults, ...fields, id: _id });
    if (!result.success) {
      throw new QueryError(
        `Unexpected document shape in ${this.collectionName}: ${result.error.message}`,
        `${this.collectionName}.parse`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  protected parseAll<T>(schema: EntitySchema<T>, documents: readonly Document[], defaults: Document = {}): T[] {
    return documents.map((document) => this.parse(schema, document, defaults));
  }
}
