import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['functions/src/**/*.test.ts', 'functions/scripts/**/*.test.ts'],
    environment: 'node',
  },
})
