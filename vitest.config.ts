import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    testTimeout: 30000,
  },
});
