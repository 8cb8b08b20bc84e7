import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for hybrid-retrieval-core.
 *
 * Every suite runs in process: backends are fakes or the bundled in-memory
 * and SQLite ':memory:' indexes.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist/**'],
    setupFiles: ['./src/test/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
