import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'src'),
    },
  },
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MONGO_URI: 'mongodb://127.0.0.1:27017/agent-runtime-test',
      JWT_SECRET: 'test-secret',
      REFRESH_TOKEN_SECRET: 'test-refresh-secret',
      ENCRYPTION_KEY: 'test-encryption-key',
    },
  },
});
