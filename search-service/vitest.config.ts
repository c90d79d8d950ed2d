import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'search-service',
    include: ['tests/unit/**/*.test.ts'],
    testTimeout: 10000,
  },
});
