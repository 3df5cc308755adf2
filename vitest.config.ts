import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'hashcommit',
    include: ['packages/*/test/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    // Depth-64 sparse trees and the 1000-leaf sweep hash a few thousand digests
    testTimeout: 30000,
    pool: 'forks',
  },
  resolve: {
    alias: [
      {
        // Load the core from source; no build step before tests
        find: '@hashcommit/merkle',
        replacement: fileURLToPath(new URL('./packages/merkle/src/index.ts', import.meta.url)),
      },
    ],
  },
});
