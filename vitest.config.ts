import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Unit and HTTP-level tests. Nothing here reaches a database or the
 * network: storage, the text model and image providers are replaced with
 * in-process stand-ins from test/helpers.
 */
export default defineConfig({
  test: {
    environment: 'node',

    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/server.ts'],
    },
    setupFiles: ['./test/setup.ts'],
  },
});
