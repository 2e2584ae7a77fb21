import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their sources, so tests need no build
    alias: [
      { find: /^@bankgw\/crypto$/, replacement: source('./packages/crypto/src/index.ts') },
      { find: /^@bankgw\/crypto\/testkit$/, replacement: source('./packages/crypto/src/testkit.ts') },
      { find: /^@bankgw\/client$/, replacement: source('./packages/client/src/index.ts') },
    ],
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    benchmark: {
      include: ['packages/*/tests/bench/**/*.bench.ts'],
    },
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});
