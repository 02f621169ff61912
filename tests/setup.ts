/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Quiet logging and a stand-in pg module so no test opens a socket.
 */

import { afterEach, vi } from 'vitest';
import { resetLogger } from '../src/logging/index.js';

// ============================================================================
// Environment Setup
// ============================================================================

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';

// ============================================================================
// Database Mocks
// ============================================================================

vi.mock('pg', async () => {
  const { createMockPool, createMockClient } = await import('./mocks/database.mock.js');
  // Plain functions, so `new Pool()` hands back the mock
  const Pool = vi.fn(function () {
    return createMockPool();
  });
  const Client = vi.fn(function () {
    return createMockClient();
  });
  return { default: { Pool, Client }, Pool, Client };
});

afterEach(() => {
  resetLogger();
});
