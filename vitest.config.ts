import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      TZ: 'UTC',
    },
  },
});
