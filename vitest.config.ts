/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],

    globals: false, // Explicit imports

    pool: 'threads',
    isolate: true,

    // Keep test output quiet and resolve shift times in UTC
    env: {
      LOG_LEVEL: 'silent',
      SCHEDULE_TIMEZONE: 'UTC',
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['coverage/**', 'dist/**', '**/*.d.ts', 'test/**', '**/*.test.ts', '**/*.config.*'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    watch: false,

    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,

    typecheck: {
      enabled: false, // tsc runs separately
    },
  },
});
