/**
 * SQLite Store Base
 * @module data/sqlite/sqlite-store
 *
 * Common statement execution for the SQLite aggregate stores. Statements use
 * `@name` placeholders bound from a plain object; every row read back is
 * validated and mapped by a zod row schema.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { QueryError, getErrorMessage } from '../../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../../logging/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Values SQLite can bind
 */
export type SqlValue = string | number | bigint | Buffer | null;

/**
 * Named statement parameters
 */
export type SqlParams = Record<string, SqlValue>;

/**
 * Row schema: validates a raw row and maps it to its domain shape
 */
export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Column Helpers
// ============================================================================

export const sqlBool = z.number().transform((value) => value === 1);
export const sqlDate = z.string().transform((value) => new Date(value));
export const sqlBlob = z.instanceof(Buffer);

/**
 * JSON text column validated against a schema
 */
export function sqlJson<T>(schema: RowSchema<T>) {
  return z.string().transform((value): unknown => JSON.parse(value)).pipe(schema);
}

export function toBool(value: boolean): number {
  return value ? 1 : 0;
}

export function toDate(value: Date | undefined): string | null {
  return value ? value.toISOString() : null;
}

export function toNull<T extends SqlValue>(value: T | undefined): T | null {
  return value ?? null;
}

const CountRow = z.object({ count: z.number() });

// ============================================================================
// Base Store
// ============================================================================

/**
 * Base class of the SQLite aggregate stores
 */
export abstract class SqliteStore {
  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly db: Database.Database,
    protected readonly tableName: string
  ) {
    this.logger = createModuleLogger(`sqlite:${tableName}`);
  }

  // ==========================================================================
  // Statement Execution
  // ==========================================================================

  /**
   * Run a query and map every row
   */
  protected queryAll<T>(row: RowSchema<T>, sql: string, params: SqlParams = {}): T[] {
    return this.measure(sql, () => this.db.prepare(sql).all(params).map((raw) => row.parse(raw)));
  }

  /**
   * Run a query and map the first row, if any
   */
  protected queryOne<T>(row: RowSchema<T>, sql: string, params: SqlParams = {}): T | undefined {
    return this.measure(sql, () => {
      const raw = this.db.prepare(sql).get(params);
      return raw === undefined ? undefined : row.parse(raw);
    });
  }

  /**
   * Run a query selecting a single `count` column
   */
  protected queryCount(sql: string, params: SqlParams = {}): number {
    return this.queryOne(CountRow, sql, params)?.count ?? 0;
  }

  /**
   * Whether a query returns any row
   */
  protected queryExists(sql: string, params: SqlParams = {}): boolean {
    return this.queryCount(`SELECT EXISTS (${sql}) AS count`, params) === 1;
  }

  /**
   * Run a statement, returning the number of changed rows
   */
  protected execute(sql: string, params: SqlParams = {}): number {
    return this.measure(sql, () => this.db.prepare(sql).run(params).changes);
  }

  /**
   * Execute operations in a transaction; nested calls become savepoints
   */
  protected inTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private measure<T>(sql: string, fn: () => T): T {
    const start = Date.now();
    try {
      const result = fn();
      this.logger.trace({ duration: Date.now() - start, table: this.tableName }, 'Query executed');
      return result;
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new QueryError(`Unexpected row shape in ${this.tableName}: ${error.message}`, sql, {
          cause: error,
        });
      }
      this.logger.error({ err: error, table: this.tableName }, 'Query failed');
      throw new QueryError(getErrorMessage(error), sql, { cause: error });
    }
  }
}
