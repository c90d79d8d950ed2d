import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['cts-search/vitest.config.ts', 'search-service/vitest.config.ts'],
  },
});
