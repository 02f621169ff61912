/**
 * PostgreSQL Store Base
 * @module data/postgres/pg-store
 *
 * Parameterized query execution and transaction support shared by the
 * PostgreSQL aggregate stores. Each operation borrows a pooled connection;
 * transactions run on one checked-out client.
 */

import type pg from 'pg';
import { QueryError, getErrorMessage } from '../../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../../logging/index.js';

/**
 * Query options
 */
export interface QueryOptions {
  /** Client of an open transaction */
  readonly client?: pg.PoolClient;
}

/**
 * Base class of the PostgreSQL aggregate stores
 */
export abstract class PgStore {
  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly pool: pg.Pool,
    protected readonly tableName: string
  ) {
    this.logger = createModuleLogger(`postgres:${tableName}`);
  }

  // ============================================================================
  // Query Execution
  // ============================================================================

  /**
   * Execute a parameterized query
   */
  protected async query<T extends pg.QueryResultRow>(
    text: string,
    params: unknown[] = [],
    options?: QueryOptions
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();

    try {
      const result = options?.client
        ? await options.client.query<T>(text, params)
        : await this.pool.query<T>(text, params);

      this.logger.trace(
        { duration: Date.now() - start, rows: result.rowCount, table: this.tableName },
        'Query executed'
      );

      return result;
    } catch (error) {
      this.logger.error({ err: error, table: this.tableName }, 'Query failed');
      throw new QueryError(getErrorMessage(error), text, { cause: error });
    }
  }

  /**
   * Execute a query and return the first row, if any
   */
  protected async queryOne<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    options?: QueryOptions
  ): Promise<T | undefined> {
    const result = await this.query<T>(text, params, options);
    return result.rows[0];
  }

  /**
   * Execute a query and return all rows
   */
  protected async queryAll<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    options?: QueryOptions
  ): Promise<T[]> {
    const result = await this.query<T>(text, params, options);
    return result.rows;
  }

  /**
   * Execute a query selecting a single `count` column (bigint, returned as text)
   */
  protected async queryCount(text: string, params?: unknown[], options?: QueryOptions): Promise<number> {
    const row = await this.queryOne<{ count: string }>(text, params, options);
    return parseInt(row?.count ?? '0', 10);
  }

  /**
   * Whether a query returns any row
   */
  protected async queryExists(text: string, params?: unknown[], options?: QueryOptions): Promise<boolean> {
    const row = await this.queryOne<{ exists: boolean }>(`SELECT EXISTS (${text}) AS exists`, params, options);
    return row?.exists ?? false;
  }

  /**
   * Execute a statement, returning the number of affected rows
   */
  protected async execute(text: string, params?: unknown[], options?: QueryOptions): Promise<number> {
    const result = await this.query(text, params, options);
    return result.rowCount ?? 0;
  }

  // ============================================================================
  // Transaction Support
  // ============================================================================

  /**
   * Execute operations in a transaction
   */
  protected async withTransaction<T>(
    fn: (client: pg.PoolClient) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
