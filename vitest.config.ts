import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    pool: 'forks',
  },
});
