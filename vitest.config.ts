import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    watch: false,
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 15000,
  },
});
