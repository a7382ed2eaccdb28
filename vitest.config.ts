import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],
    environment: 'node',
  },
})
