import { defineConfig } from 'vitest/config';

// `npm test -w @riddle/solver-core` runs the core on its own.
export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    globals: true,
  },
});
