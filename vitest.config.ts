import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
      STORE_DRIVER: 'sqlite',
      SQLITE_PATH: ':memory:',
    },
  },
});
