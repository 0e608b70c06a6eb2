import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    // Off UTC, so local-calendar date handling is exercised.
    env: { TZ: 'Asia/Tokyo' },
    include: ['src/**/*.test.ts', 'server/src/**/*.test.ts'],
  },
})
