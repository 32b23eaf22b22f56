import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      FETCHARR_LOG_LEVEL: 'silent',
    },
  },
});
