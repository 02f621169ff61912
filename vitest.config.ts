/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the web log persistence core.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 30000,
    hookTimeout: 30000,

    // better-sqlite3 is a native add-on; forks keep it out of worker threads
    pool: 'forks',

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    // Mock configuration
    clearMocks: true,
    restoreMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts', 'src/types/**/*.ts'],
    },
  },

  // ESBuild configuration for TypeScript
  esbuild: {
    target: 'node20',
  },
});
