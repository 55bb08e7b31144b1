import { defineConfig } from 'vitest/config';

// Runs every workspace's tests in one pass.
export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    environment: 'node',
    globals: true,
    reporters: ['default'],
  },
});
