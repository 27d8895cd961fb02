import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Lifecycle tests emit process signals; keep each file in its own process
    pool: 'forks',
    testTimeout: 20000
  }
})
