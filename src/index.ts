/**
 * Web log persistence core
 * @module inkwell-data
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './utils/result.js';
export * from './utils/domain-result.js';

export * from './data/interfaces.js';
export * from './data/paging.js';
export * from './data/diff.js';
export * from './data/hierarchy.js';
export { createData } from './data/factory.js';
export { PostgresData, POSTGRES_TABLES } from './data/postgres/index.js';
export { SqliteData, SQLITE_TABLES } from './data/sqlite/index.js';
export { MongoData, MONGO_INDEXES, Collections } from './data/mongo/index.js';
export type { DocumentCollection, DocumentDatabase } from './data/mongo/index.js';

export * from './cache/index.js';
export * from './backup/index.js';
export { startUp, type Application, type StartUpOptions } from './startup.js';
