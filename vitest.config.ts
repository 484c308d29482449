import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    env: {
      ROOMSCAN_INCLUDE_DIMENSIONS: 'true',
      ROOMSCAN_ROTATE_ELEMENTS: 'false',
      ROOMSCAN_LOG_LEVEL: 'silent',
    },
  },
})
