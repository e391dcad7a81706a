import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    mainFields: ['module', 'main'],
  },
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
})
