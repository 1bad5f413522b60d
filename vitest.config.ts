import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Keep a repo-root .env out of the tests
  envDir: 'src',
  test: {
    globals: false,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
