import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'mcp-server',
    include: ['__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
})
