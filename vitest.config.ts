import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@stageflow/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['engine/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
