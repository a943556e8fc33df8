import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    // CLI tests start a child process through tsx
    testTimeout: 30_000,
  },
});
