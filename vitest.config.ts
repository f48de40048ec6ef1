import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Prevent hanging processes
    testTimeout: 30000,
    hookTimeout: 30000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 4,
      },
    },
    include: ['src/**/*.{test,spec}.ts', 'tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.git', '.cache'],
  },
});
