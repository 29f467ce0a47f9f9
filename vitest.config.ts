import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.spec.ts'],
    env: {
      LOG_LEVEL: 'error',
      NODE_ENV: 'test'
    }
  }
})
