import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cts-search',
    include: ['tests/unit/**/*.test.ts'],
    testTimeout: 5000,
  },
});
