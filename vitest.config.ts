import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    // read by getConfig() on first import, before any setup code runs
    env: {
      NODE_ENV: 'test',
      DB_CLIENT: 'better-sqlite3',
      DB_FILENAME: ':memory:',
      LOG_LEVEL: 'silent',
      JWT_SECRET: 'test-secret',
    },
    include: ['tests/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 60000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // one in-memory database per file, files run one after another
      },
    },
    fileParallelism: false,
  },
});
