import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerjob/types': pkg('types'),
      '@ledgerjob/ledger': pkg('ledger'),
      '@ledgerjob/rules': pkg('rules'),
      '@ledgerjob/output': pkg('output'),
      '@ledgerjob/sources': pkg('sources'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
