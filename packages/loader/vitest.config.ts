import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@confguard/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
