import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // PGlite boots a wasm Postgres per test file
    testTimeout: 30000,
    hookTimeout: 60000,
    pool: 'forks',
  },
})
