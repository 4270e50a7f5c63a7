import { defineConfig } from 'vitest/config';

// Every suite runs in process: unit + e2e on InMemUserStore, DAL on a recording Kysely driver.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/{unit,dal,e2e}/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
  },
});
