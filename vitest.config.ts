import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000, // scenario runs against the mock server take a few seconds
    hookTimeout: 30000,
    include: ['src/**/*.test.ts'],
    // Every test file starts its own mock server on an ephemeral port
    pool: 'forks',
  },
});
