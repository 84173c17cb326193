import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration
 *
 * Every suite runs in process: git is replaced by an in-memory client and
 * file fixtures live in temporary directories.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'src/__tests__/helpers/**', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
