import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: process.env.CI ? 60000 : 30000,
    hookTimeout: process.env.CI ? 60000 : 30000,
    reporters: ['default'],
    env: {
      WASMBENCH_LOG_LEVEL: 'silent',
    },
  },
});
