import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/__tests__/*.test.ts'],
    testTimeout: 20_000,
  },
})
