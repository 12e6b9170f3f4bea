import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['packages/**/*.ts'],
      exclude: ['packages/**/__tests__/**', 'packages/cli/src/bin/**', 'packages/**/index.ts'],
    },
    testTimeout: 10000,
  },
});
