import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      OPENAI_API_KEY: 'test-key',
      LOG_LEVEL: 'silent',
      DIGEST_FROM: 'digest@example.com',
      DIGEST_TO: 'reader@example.com',
    },
  },
});
