import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@plugin-host/plugin-contracts': pkg('plugin-contracts'),
      '@plugin-host/plugin-manifest': pkg('plugin-manifest'),
      '@plugin-host/plugin-runtime': pkg('plugin-runtime'),
      '@plugin-host/plugin-catalog': pkg('plugin-catalog'),
      '@plugin-host/plugin-testing': pkg('plugin-testing'),
    },
  },
  test: {
    environment: 'node',
    env: {
      PLUGIN_HOST_LOG_LEVEL: 'silent',
    },
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*'],
    },
  },
});
