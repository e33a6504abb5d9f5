/**
 * Vitest configuration
 *
 * Unit tests run under Node.js against real temporary directories.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    pool: 'forks',
    sequence: {
      shuffle: false,
    },
    testTimeout: 30000,
  },
})
