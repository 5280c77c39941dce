import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';

export default defineConfig({
  resolve: {
    alias: {
      '@carecomply/compliance': resolve(__dirname, 'packages/compliance/src'),
      '@carecomply/security': resolve(__dirname, 'packages/security/src'),
      '@carecomply/storage': resolve(__dirname, 'packages/storage/src'),
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: false,
  },
});
