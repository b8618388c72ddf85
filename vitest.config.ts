import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit and integration tests live under test/ and run against the in-process
 * memory backend, so no Redis server or generator service is needed.
 */
export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    // Pre-generation tests wait on real (short) batch delays
    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['test/', 'dist/', '*.config.ts'],
    },
  },
});
