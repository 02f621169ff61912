/**
 * Backend Selection
 * @module data/factory
 */

import type { DataConfig } from '../config/index.js';
import type { IData } from './interfaces.js';
import { PostgresData } from './postgres/index.js';
import { SqliteData } from './sqlite/index.js';
import { MongoData } from './mongo/index.js';

/**
 * Open the configured backend. Tables are not touched until `startUp()`.
 */
export async function createData(config: DataConfig): Promise<IData> {
  switch (config.backend) {
    case 'postgres':
      return PostgresData.open(config.postgres);
    case 'sqlite':
      return SqliteData.open(config.sqlite);
    case 'mongodb':
      return MongoData.connect(config.mongodb);
  }
}
