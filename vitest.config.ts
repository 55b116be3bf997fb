import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    testTimeout: 15_000,
    env: {
      OPENAI_API_KEY: 'test-key-for-unit-tests',
      ENABLE_AUTO_BACKUP: 'false',
    },
  },
});
