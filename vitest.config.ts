import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gaugelink/core': packageSource('core'),
      '@gaugelink/entity-resolution': packageSource('entity-resolution'),
      '@gaugelink/connector-file': packageSource('connector-file'),
      '@gaugelink/reconciliation': packageSource('reconciliation'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
