import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources without a build
      '@payroute/kernel': src('kernel'),
      '@payroute/masking': src('masking'),
      '@payroute/errors': src('errors'),
      '@payroute/domain': src('domain'),
      '@payroute/connectors-core': src('connectors/core'),
      '@payroute/connector-opayo': src('connectors/opayo'),
      '@payroute/connector-authorizedotnet': src('connectors/authorizedotnet'),
      '@payroute/router': src('router'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    bail: process.env.CI ? 1 : 0,
  },
});
