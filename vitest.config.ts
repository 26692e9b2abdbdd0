import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    env: { TZ: 'UTC', LOG_LEVEL: 'silent' },
  },
});
