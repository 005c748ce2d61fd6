import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/vitest-setup.ts'],
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    exclude: ['**/node_modules/**', '**/dist/**'],
    // ALWAYS run once and exit, never watch
    watch: false,
    bail: 0,  // Don't bail on first failure
    hookTimeout: 10000,
    isolate: true
  },
});
