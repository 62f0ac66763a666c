import { createRequire } from 'node:module'
import { defineConfig } from 'vitest/config'

const require = createRequire(import.meta.url)

export default defineConfig({
  resolve: {
    alias: {
      // drizzle-kit's ESM api bundle does a dynamic require('fs'), which fails under
      // ESM; load the package's own CommonJS build of the same API instead.
      'drizzle-kit/api': require.resolve('drizzle-kit/api'),
    },
  },
  test: {
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    clearMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      exclude: ['**/node_modules/**', 'dist/**', 'tests/**', '**/*.d.ts'],
    },
  },
})
