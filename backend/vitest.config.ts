import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // bcrypt runs for real in e2e specs (cost 4), keep headroom on slow CI boxes
    testTimeout: 15_000,
  },
});
