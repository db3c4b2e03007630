import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['packages/shared', 'apps/api'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/shared/src/**/*.ts', 'apps/api/src/**/*.ts'],
      exclude: ['**/index.ts', '**/*.test.ts'],
      thresholds: {
        statements: 85,
        branches: 90,
        functions: 85,
        lines: 85,
      },
    },
  },
});
