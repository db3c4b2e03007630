import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'api',
    include: ['__tests__/unit/**/*.test.ts', '__tests__/contract/**/*.test.ts'],
    globals: true,
  },
});
