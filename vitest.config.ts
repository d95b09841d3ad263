import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    env: {
      HYBRIDNOTE_LOG_LEVEL: 'silent',
    },
  },
});
