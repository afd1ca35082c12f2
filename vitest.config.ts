import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: [
      'packages/shared/src/tests/**/*.test.ts',
      'packages/presenter/src/tests/**/*.test.ts',
    ],
  },
})
