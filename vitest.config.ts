import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'authority-sync',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['packages/authority-sync/src/__tests__/setup.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
