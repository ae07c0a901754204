import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'campaign-utils',
    environment: 'node',
    include: ['src/**/*.test.ts']
  }
})
