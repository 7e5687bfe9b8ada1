/**
 * Vitest config for starglob (Node.js environment)
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['core/**/*.test.ts', 'utils/**/*.test.ts', 'test/**/*.test.ts'],
    environment: 'node',
  },
})
