import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      shared: fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      argbind: fileURLToPath(new URL('./packages/cli/src/lib/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
  },
})
