import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // PGlite boots a WASM build of PostgreSQL per suite
    testTimeout: 30000,
    hookTimeout: 30000
  }
});
