import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspacePackage = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shardstats/core': workspacePackage('core'),
      '@shardstats/wire': workspacePackage('wire'),
      '@shardstats/broadcast': workspacePackage('broadcast'),
      '@shardstats/indices-stats': workspacePackage('indices-stats'),
    },
  },
  test: {
    name: 'unit',
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/__tests__/**', 'packages/*/src/index.ts'],
    },
  },
});
