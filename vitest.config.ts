import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@gitbench/core': fileURLToPath(new URL('./packages/bench-core/src/index.ts', import.meta.url)),
      '@gitbench/sandbox': fileURLToPath(new URL('./packages/bench-sandbox/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
  },
});
