/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Environment configuration
    environment: 'node',

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],

    // Explicit imports from 'vitest' in every test file
    globals: false,

    // better-sqlite3 is a native addon; forked workers keep each file's handles apart
    pool: 'forks',

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    watch: false,

    // Set before any module loads, so loggers created at import time are quiet too
    env: {
      LOG_LEVEL: 'silent',
    },

    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,
    isolate: true,

    // Type checking runs through tsc separately
    typecheck: {
      enabled: false,
    },
  },
});
