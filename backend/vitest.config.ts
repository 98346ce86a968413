import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // e2e specs boot an in-process Postgres per app
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
