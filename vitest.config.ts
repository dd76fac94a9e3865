import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/shared/core/tests/**/*.test.ts',
      'packages/server/tests/**/*.test.ts'
    ],
    testTimeout: 10000
  }
});
