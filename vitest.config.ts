import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.*'],
    environment: 'node',
    globals: true,
  },
})
