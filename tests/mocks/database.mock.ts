/**
 * Database Mock Utilities
 * @module tests/mocks/database.mock
 *
 * Stand-ins for pg's Pool and Client. Every statement sent through a pool or
 * one of its clients is recorded; results are programmed by SQL substring.
 */

import { vi, type Mock } from 'vitest';

export interface MockQueryResult {
  rows: unknown[];
  rowCount: number;
}

export interface RecordedQuery {
  text: string;
  params: unknown[];
}

type QueryFn = (text: string, params?: unknown[]) => Promise<MockQueryResult>;

/**
 * Mock PostgreSQL client interface
 */
export interface MockPoolClient {
  query: Mock<QueryFn>;
  release: Mock<() => void>;
  connect: Mock<() => Promise<void>>;
  end: Mock<() => Promise<void>>;
  on: Mock;
}

/**
 * Mock PostgreSQL pool interface
 */
export interface MockPool {
  connect: Mock<() => Promise<MockPoolClient>>;
  query: Mock<QueryFn>;
  end: Mock<() => Promise<void>>;
  on: Mock;
  totalCount: number;
  idleCount: number;
  waitingCount: number;
  client: MockPoolClient;
  /** Statements sent so far, pool and client alike, in order */
  queries: RecordedQuery[];
  /** Answer queries containing `pattern`; later patterns win */
  respond(pattern: string, rows: unknown[], rowCount?: number): void;
  /** Make queries containing `pattern` fail */
  fail(pattern: string, error: Error): void;
}

interface Responder {
  pattern: string;
  result: MockQueryResult | Error;
}

const pools: MockPool[] = [];

/**
 * The pool most recently created through the mocked `pg.Pool`
 */
export function lastMockPool(): MockPool {
  const pool = pools[pools.length - 1];
  if (!pool) throw new Error('No mock pool has been created');
  return pool;
}

function createQueryHandler(responders: Responder[], queries: RecordedQuery[]): Mock<QueryFn> {
  return vi.fn(async (text: string, params: unknown[] = []) => {
    queries.push({ text, params });
    for (let index = responders.length - 1; index >= 0; index--) {
      const { pattern, result } = responders[index];
      if (!text.includes(pattern)) continue;
      if (result instanceof Error) throw result;
      return result;
    }
    return { rows: [], rowCount: 0 };
  });
}

function buildClient(responders: Responder[], queries: RecordedQuery[]): MockPoolClient {
  return {
    query: createQueryHandler(responders, queries),
    release: vi.fn(),
    connect: vi.fn(async () => undefined),
    end: vi.fn(async () => undefined),
    on: vi.fn(),
  };
}

/**
 * Create a mock PostgreSQL client
 */
export function createMockClient(): MockPoolClient {
  return buildClient([], []);
}

/**
 * Create a mock PostgreSQL pool
 */
export function createMockPool(queryResults: Record<string, unknown[]> = {}): MockPool {
  const responders: Responder[] = Object.entries(queryResults)
    .map(([pattern, rows]) => ({ pattern, result: { rows, rowCount: rows.length } }));
  const queries: RecordedQuery[] = [];
  const client = buildClient(responders, queries);

  const pool: MockPool = {
    connect: vi.fn(async () => client),
    query: createQueryHandler(responders, queries),
    end: vi.fn(async () => undefined),
    on: vi.fn(),
    totalCount: 10,
    idleCount: 5,
    waitingCount: 0,
    client,
    queries,
    respond(pattern, rows, rowCount = rows.length) {
      responders.push({ pattern, result: { rows, rowCount } });
    },
    fail(pattern, error) {
      responders.push({ pattern, result: error });
    },
  };
  pools.push(pool);
  return pool;
}
