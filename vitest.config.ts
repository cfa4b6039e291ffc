import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],

    // Timeout for each test (the UDP tests wait on real timers)
    testTimeout: 10000,
  },
});
