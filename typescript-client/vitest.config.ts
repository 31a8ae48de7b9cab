import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Unit tests, plus integration tests against in-memory and loopback servers
    include: ['tests/**/*.test.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Re-export file
        'src/testing/**', // Test double shipped for consumers
      ],
      thresholds: {
        lines: 85,
        branches: 80,
        functions: 85,
        statements: 85,
      },
    },

    watch: false,

    // Loopback TCP tests wait on real sockets
    testTimeout: 10000,
  },
});
