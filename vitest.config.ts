import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/integration/**/*.integration.test.ts'],
    testTimeout: 30_000,
  },
  resolve: {
    alias: {
      '@lineage/core': source('./packages/core/src/index.ts'),
      '@lineage/engine': source('./packages/engine/src/index.ts'),
    },
  },
});
