import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./server/tests/setup.ts'],
    testTimeout: 15000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    pool: 'forks',
    include: [
      'server/tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules/**',
      'dist/**'
    ],
  },
});
