import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'storm-impact',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
    environment: 'node',
  },
});
