/**
 * In-Memory Document Store
 * @module tests/mocks/document-store.mock
 *
 * Implements the document-store port over plain maps with the slice of the
 * MongoDB query language the adapter uses: equality (including array
 * membership, and null matching a missing field), $in, $ne, $lt, $lte, $gt,
 * $gte and $exists in filters; $set, $unset, $pull and $push in updates;
 * multi-key sorts, skip, limit and top-level projections. Inserting an
 * existing `_id` fails the way the driver-backed collection does.
 */

import { MongoServerError, type Document } from 'mongodb';
import { QueryError, getErrorMessage } from '../../src/errors/index.js';
import type {
  DocumentCollection,
  DocumentDatabase,
  DocumentFilter,
  DocumentProjection,
  DocumentSort,
  DocumentUpdate,
  FindOptions,
  StoredDocument,
} from '../../src/data/mongo/collections.js';

// ============================================================================
// Values
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && !(value instanceof Date)
    && !Buffer.isBuffer(value);
}

function entries(value: object): Array<[string, unknown]> {
  return Object.entries(value);
}

/**
 * Deep copy that keeps dates and buffers and drops undefined fields, as the
 * driver does with `ignoreUndefined`
 */
export function cloneValue(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime());
  if (Buffer.isBuffer(value)) return Buffer.from(value);
  if (Array.isArray(value)) return value.map(cloneValue);
  if (isPlainObject(value)) return cloneDocument(value);
  return value;
}

function cloneDocument(document: object): Document {
  const copy: Document = {};
  for (const [key, value] of entries(document)) {
    if (value !== undefined) copy[key] = cloneValue(value);
  }
  return copy;
}

function cloneStored(document: StoredDocument): StoredDocument {
  return { ...cloneDocument(document), _id: document._id };
}

function typeRank(value: unknown): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === 'number') return 1;
  if (typeof value === 'string') return 2;
  if (Buffer.isBuffer(value)) return 5;
  if (typeof value === 'boolean') return 8;
  if (value instanceof Date) return 9;
  if (Array.isArray(value)) return 4;
  return 3;
}

function compareValues(a: unknown, b: unknown): number {
  const rankDifference = typeRank(a) - typeRank(b);
  if (rankDifference !== 0) return rankDifference;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return 0;
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) return a.equals(b);
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((key) => valuesEqual(a[key], b[key]));
  }
  if ((a === undefined || a === null) && (b === undefined || b === null)) return true;
  return a === b;
}

// ============================================================================
// Filters
// ============================================================================

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value) && Object.keys(value).length > 0
    && Object.keys(value).every((key) => key.startsWith('$'));
}

/** A field value, or each element when the field holds an array */
function candidates(value: unknown): unknown[] {
  return Array.isArray(value) ? [value, ...value] : [value];
}

function matchesOperator(value: unknown, operator: string, operand: unknown): boolean {
  switch (operator) {
    case '$in':
      return Array.isArray(operand)
        && candidates(value).some((candidate) => operand.some((item) => valuesEqual(candidate, item)));
    case '$ne':
      return !candidates(value).some((candidate) => valuesEqual(candidate, operand));
    case '$exists':
      return (value !== undefined) === Boolean(operand);
    case '$lt':
      return value !== undefined && value !== null && compareValues(value, operand) < 0;
    case '$lte':
      return value !== undefined && value !== null && compareValues(value, operand) <= 0;
    case '$gt':
      return value !== undefined && value !== null && compareValues(value, operand) > 0;
    case '$gte':
      return value !== undefined && value !== null && compareValues(value, operand) >= 0;
    default:
      throw new Error(`Unsupported filter operator ${operator}`);
  }
}

function matchesCondition(value: unknown, condition: unknown): boolean {
  if (isOperatorObject(condition)) {
    return entries(condition).every(([operator, operand]) => matchesOperator(value, operator, operand));
  }
  return candidates(value).some((candidate) => valuesEqual(candidate, condition));
}

export function matchesFilter(document: Document, filter: object): boolean {
  return entries(filter).every(([field, condition]) => matchesCondition(document[field], condition));
}

// ============================================================================
// Updates
// ============================================================================

function pullMatches(element: unknown, condition: unknown): boolean {
  if (isPlainObject(condition) && !isOperatorObject(condition)) {
    return isPlainObject(element) && matchesFilter(element, condition);
  }
  return matchesCondition(element, condition);
}

function applyUpdate(document: Document, update: DocumentUpdate): void {
  for (const [operator, fields] of entries(update)) {
    if (!isPlainObject(fields)) throw new Error(`Malformed ${operator} update`);
    for (const [field, operand] of entries(fields)) {
      switch (operator) {
        case '$set':
          if (operand === undefined) delete document[field];
          else document[field] = cloneValue(operand);
          break;
        case '$unset':
          delete document[field];
          break;
        case '$pull': {
          const current: unknown = document[field];
          if (Array.isArray(current)) {
            document[field] = current.filter((element) => !pullMatches(element, operand));
          }
          break;
        }
        case '$push': {
          const current: unknown = document[field];
          const added = isPlainObject(operand) && Array.isArray(operand.$each) ? operand.$each : [operand];
          document[field] = [...(Array.isArray(current) ? current : []), ...added.map(cloneValue)];
          break;
        }
        default:
          throw new Error(`Unsupported update operator ${operator}`);
      }
    }
  }
}

// ============================================================================
// Projection and Sorting
// ============================================================================

function project(document: StoredDocument, projection?: DocumentProjection): StoredDocument {
  const copy = cloneStored(document);
  if (!projection) return copy;
  const fields = entries(projection);
  if (fields.some(([, flag]) => flag === 1)) {
    const included: StoredDocument = { _id: copy._id };
    for (const [field, flag] of fields) {
      if (flag === 1 && copy[field] !== undefined) included[field] = copy[field];
    }
    return included;
  }
  for (const [field] of fields) delete copy[field];
  return copy;
}

function sortDocuments(documents: StoredDocument[], sort?: DocumentSort): StoredDocument[] {
  if (!sort) return documents;
  const keys = entries(sort);
  return [...documents].sort((a, b) => {
    for (const [field, direction] of keys) {
      const order = compareValues(a[field], b[field]);
      if (order !== 0) return direction === -1 ? -order : order;
    }
    return 0;
  });
}

// ============================================================================
// Collections
// ============================================================================

export interface RecordedIndex {
  readonly keys: DocumentSort;
  readonly unique: boolean;
}

export class InMemoryCollection implements DocumentCollection {
  readonly documents: StoredDocument[] = [];
  readonly indexes: RecordedIndex[] = [];

  constructor(readonly name: string) {}

  private matching(filter: DocumentFilter): StoredDocument[] {
    return this.documents.filter((document) => matchesFilter(document, filter));
  }

  async findOne(filter: DocumentFilter, options: FindOptions = {}): Promise<StoredDocument | undefined> {
    const [found] = await this.find(filter, { ...options, limit: 1 });
    return found;
  }

  async find(filter: DocumentFilter, options: FindOptions = {}): Promise<StoredDocument[]> {
    const sorted = sortDocuments(this.matching(filter), options.sort);
    const skip = options.skip ?? 0;
    const window = options.limit !== undefined && options.limit > 0
      ? sorted.slice(skip, skip + options.limit)
      : sorted.slice(skip);
    return window.map((document) => project(document, options.projection));
  }

  async countDocuments(filter: DocumentFilter): Promise<number> {
    return this.matching(filter).length;
  }

  async insertOne(document: StoredDocument): Promise<void> {
    if (this.documents.some((candidate) => candidate._id === document._id)) {
      const cause = new MongoServerError({
        message: `E11000 duplicate key error collection: ${this.name} index: _id_ dup key: { _id: "${document._id}" }`,
        code: 11000,
      });
      throw new QueryError(getErrorMessage(cause), `${this.name}.insertOne`, { cause });
    }
    this.documents.push(cloneStored(document));
  }

  async upsert(filter: DocumentFilter, document: StoredDocument): Promise<void> {
    const index = this.documents.findIndex((candidate) => matchesFilter(candidate, filter));
    const replacement = cloneStored(document);
    if (index === -1) {
      this.documents.push(replacement);
    } else {
      this.documents[index] = { ...replacement, _id: this.documents[index]._id };
    }
  }

  async updateOne(filter: DocumentFilter, update: DocumentUpdate): Promise<number> {
    const [document] = this.matching(filter);
    if (!document) return 0;
    applyUpdate(document, update);
    return 1;
  }

  async updateMany(filter: DocumentFilter, update: DocumentUpdate): Promise<number> {
    const documents = this.matching(filter);
    for (const document of documents) applyUpdate(document, update);
    return documents.length;
  }

  async deleteOne(filter: DocumentFilter): Promise<number> {
    const index = this.documents.findIndex((document) => matchesFilter(document, filter));
    if (index === -1) return 0;
    this.documents.splice(index, 1);
    return 1;
  }

  async deleteMany(filter: DocumentFilter): Promise<number> {
    const before = this.documents.length;
    const kept = this.documents.filter((document) => !matchesFilter(document, filter));
    this.documents.splice(0, this.documents.length, ...kept);
    return before - kept.length;
  }

  async createIndex(keys: DocumentSort, options: { unique?: boolean } = {}): Promise<void> {
    if (this.indexes.some((index) => valuesEqual(index.keys, keys))) return;
    this.indexes.push({ keys, unique: options.unique ?? false });
  }
}

export class InMemoryDocumentDatabase implements DocumentDatabase {
  private readonly collections = new Map<string, InMemoryCollection>();
  private readonly created = new Set<string>();
  closed = false;

  collection(name: string): InMemoryCollection {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new InMemoryCollection(name);
      this.collections.set(name, collection);
    }
    return collection;
  }

  async collectionNames(): Promise<string[]> {
    const names = new Set(this.created);
    for (const [name, collection] of this.collections) {
      if (collection.documents.length > 0) names.add(name);
    }
    return [...names].sort();
  }

  async createCollection(name: string): Promise<void> {
    this.created.add(name);
    this.collection(name);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
