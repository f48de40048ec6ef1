import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for integration tests
 * These tests spawn the built CLI and are slower
 */
export default defineConfig({
  test: {
    include: ['tests/integration/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    globals: false,
    environment: 'node',
  },
});
