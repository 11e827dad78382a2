import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      DATA_STORE: 'memory',
      JWT_SECRET: 'test-secret',
      BCRYPT_ROUNDS: '4',
      LOG_LEVEL: 'error',
    },
  },
});
