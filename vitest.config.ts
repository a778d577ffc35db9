import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15000,
    environment: 'node',

    // Every suite runs against the in-memory store or a mocked pg Pool, so
    // files are independent and can run in parallel.
    fileParallelism: true,

    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
