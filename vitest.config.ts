import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      VARIANT_ENV: 'test',
      VARIANT_LOG_LEVEL: 'silent',
    },
  },
});
