import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'config',
    include: ['__tests__/**/*.test.ts'],
  },
})
