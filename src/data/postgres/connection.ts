/**
 * PostgreSQL Connection Pool
 * @module data/postgres/connection
 */

import pg from 'pg';
import { BackendUnavailableError } from '../../errors/index.js';
import { createModuleLogger } from '../../logging/index.js';
import type { PostgresConfig } from '../../config/index.js';

const { Pool } = pg;

/**
 * Create a connection pool for the configured database
 */
export function createPool(config: PostgresConfig): pg.Pool {
  const logger = createModuleLogger('db-connection');
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });

  pool.on('connect', () => {
    logger.debug('New client connected to pool');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected pool error');
  });

  pool.on('remove', () => {
    logger.debug('Client removed from pool');
  });

  return pool;
}

/**
 * Verify the pool can reach the server, failing with
 * {@link BackendUnavailableError} when it cannot
 */
export async function checkConnection(pool: pg.Pool, config: PostgresConfig): Promise<void> {
  try {
    await pool.query('SELECT 1 AS health_check');
  } catch (error) {
    throw new BackendUnavailableError('postgres', config.connectionString, error);
  }
  createModuleLogger('db-connection').backendConnected('postgres', config.connectionString);
}

/**
 * Close the connection pool
 */
export async function closePool(pool: pg.Pool): Promise<void> {
  await pool.end();
  createModuleLogger('db-connection').backendClosed('postgres');
}
