import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    exclude: ['node_modules/**'],
  },
})
