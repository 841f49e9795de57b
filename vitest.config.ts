import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      LOG_FORMAT: 'json',
    },
  },
})
