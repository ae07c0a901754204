/// <reference types="vitest/config" />
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'dispatcher',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      JEC_DISPATCH_LOGS: '/tmp/jec-dispatch-logs-test',
      LOG_LEVEL: 'info',
      JEC_DISPATCH_TIMEZONE: 'UTC'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts']
    }
  }
})
