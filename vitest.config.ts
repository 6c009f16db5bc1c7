import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
      // keeps a developer's ~/.switchyard/settings.json out of test runs
      SWITCHYARD_SETTINGS_PATH: '/nonexistent/switchyard/settings.json',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/index.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'threads',
  },
  resolve: {
    alias: {
      '@switchyard/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@switchyard/rpc': fileURLToPath(new URL('./packages/rpc/src/index.ts', import.meta.url)),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
