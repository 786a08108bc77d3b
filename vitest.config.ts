// vitest.config.ts
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    globals: true,
    setupFiles: ['./test/setup.ts'],
    testTimeout: 10_000,
    coverage: {
      reporter: ['text', 'json', 'html']
    }
  }
})
