import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // config/env.ts validates these at import time
    env: {
      REDIS_HOST: 'localhost',
      REDIS_PORT: '6379',
      PORT: '3000',
      NODE_ENV: 'test',
    },
  },
});
