import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@dataherd/core/testing': fileURLToPath(new URL('../core/src/testing/index.ts', import.meta.url)),
      '@dataherd/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
