import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 60000,
    pool: 'forks',
    // Each test file gets its own in-memory SQLite ledger store
    env: {
      NODE_ENV: 'test',
      DB_CLIENT: 'better-sqlite3',
      DB_FILENAME: ':memory:',
      JWT_SECRET: 'test-secret',
      LOG_LEVEL: 'silent',
      ALLOW_DIRECT_SALE_EDIT: 'true',
    },
    sequence: {
      setupFiles: 'list',
    },
  },
});
