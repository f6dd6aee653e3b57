import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      SERVICE_TOKEN: 'test-service-token',
      LOG_LEVEL: 'error',
    },
    restoreMocks: true,
  },
});
