import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15000,
    fileParallelism: true,

    include: [
      // Pure unit tests co-located in src/
      'src/**/*.test.ts',
      // Controller, hub and connector tests against in-process fakes
      'tests/**/*.test.ts',
    ],

    exclude: ['node_modules/**', '**/node_modules/**', 'dist/**'],
  },
});
