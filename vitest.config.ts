import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/test/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    // Run tests serially so the optional Mongo/Redis suites never share a namespace
    fileParallelism: false
  }
})
