import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'core',
    root: fileURLToPath(new URL('.', import.meta.url)),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@mirrorchain/core': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
    },
  },
});
