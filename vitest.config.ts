/**
 * Vitest configuration.
 *
 * Mirrors the `@/` path alias from tsconfig.json so tests and sources resolve
 * imports the same way tsx does at runtime.
 */
import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
