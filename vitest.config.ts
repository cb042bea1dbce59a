import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function workspaceEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources
      '@hostkit/logging': workspaceEntry('logging'),
      '@hostkit/net': workspaceEntry('net'),
      '@hostkit/http-auth': workspaceEntry('http-auth'),
      '@hostkit/series': workspaceEntry('series'),
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
    // CI stops at the first failing test
    bail: process.env.CI ? 1 : 0,
  },
});
