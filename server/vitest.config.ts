import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Loading TypeScript sources starts a full compiler program.
    testTimeout: 30_000,
  },
});
