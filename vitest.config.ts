import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
    env: {
      LOG_LEVEL: 'silent',
      FMGW_LOG_FILE: '0',
    },
  },
});
