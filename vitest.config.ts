import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.{test,spec}.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],
    // Use jsdom for React tests
    environmentMatchGlobs: [['tests/react/**', 'jsdom']],
    pool: 'threads',
    poolOptions: {
      threads: {
        maxThreads: 4,
        minThreads: 1,
      },
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})
