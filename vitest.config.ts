import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@jarsync/types': fromRoot('./packages/types/src/index.ts'),
      '@jarsync/bank-bridge': fromRoot('./packages/bank-bridge/src/index.ts'),
      '@jarsync/coverage': fromRoot('./packages/coverage/src/index.ts'),
      '@jarsync/store': fromRoot('./packages/store/src/index.ts'),
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
