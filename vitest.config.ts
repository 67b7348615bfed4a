import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      lockbox: fileURLToPath(new URL('./packages/lockbox/src/index.ts', import.meta.url)),
      '@lockbox/test-helpers': fileURLToPath(
        new URL('./packages/test-helpers/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
})
