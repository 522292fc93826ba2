import { defineConfig } from 'vitest/config';

// Runs the CRUD contract suite against the real API; needs network access.
export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/live/**/*.test.ts'],
    // Objects are shared remote state; keep the run sequential
    fileParallelism: false,
    sequence: { concurrent: false },
    testTimeout: 120000,
    hookTimeout: 60000,
  },
});
