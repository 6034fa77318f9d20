import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // PGlite boots a full Postgres in WASM per database
    testTimeout: 30_000,
    hookTimeout: 30_000,
    // a zone off UTC, so timestamp tests see any offset shift
    env: { TZ: 'Europe/Berlin' },
  },
});
