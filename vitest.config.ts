// Workflow checks live under .github/, which the default glob skips.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['lib/**/*.test.ts', '.github/workflows/*.test.ts'],
  },
})
