import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      QUEUE_LOG_LEVEL: 'silent',
    },
  },
});
