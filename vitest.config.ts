import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    // Log level and device globals are process-wide
    poolOptions: {
      forks: {
        isolate: true,
      },
    },
    testTimeout: 10_000,
  },
});
