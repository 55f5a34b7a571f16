// Vitest configuration

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    environment: 'node',

    testTimeout: 10000,

    // keep test runs off the real log file and quiet on the console
    env: {
      LOG_FILE_PATH: '',
      LOG_LEVEL: 'silent',
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
        'shared-types/**',
        'backend/src/cli.ts'
      ]
    },

    include: [
      'backend/src/**/*.{test,spec}.ts',
      'shared-types/**/*.{test,spec}.ts'
    ],

    exclude: ['node_modules/', 'dist/']
  }
})
