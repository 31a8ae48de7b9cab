import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const clientSource = (path: string): string => fileURLToPath(new URL(`../typescript-client/src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    // Run against the client's sources, no build needed
    alias: [
      { find: /^@paper-cache\/client\/testing$/, replacement: clientSource('testing/MockTransport.ts') },
      { find: /^@paper-cache\/client$/, replacement: clientSource('index.ts') },
    ],
  },
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // CLI entry point
      ],
      thresholds: {
        lines: 90,
        branches: 90,
        functions: 90,
        statements: 90,
      },
    },
    include: ['tests/**/*.test.ts'],
  },
});
