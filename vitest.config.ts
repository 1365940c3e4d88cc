import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // tree-sitter is a native addon; keep each test file in its own process
    pool: 'forks',
    testTimeout: 20000,
  },
});
