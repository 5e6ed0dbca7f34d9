/**
 * Vitest configuration for the flaky-rerun workspaces
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 10000,
    hookTimeout: 5000,

    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
  },

  resolve: {
    alias: {
      '@flaky-rerun/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
    },
  },
});
