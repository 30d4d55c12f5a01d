import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Retry tests sleep through real (short) backoff intervals
    testTimeout: 10000,
  },
});
