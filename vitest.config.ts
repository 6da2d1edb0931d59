import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    pool: 'forks',
    env: {
      DB_PATH: ':memory:',
      LOG_LEVEL: 'error',
      BUSINESS_CURRENCY: 'USD',
    },
  },
})
