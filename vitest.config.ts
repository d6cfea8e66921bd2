import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@vitals/core': resolve(__dirname, 'packages/vitals/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: ['packages/*/src/**/*.ts'],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/index.ts',
        'packages/cli/src/cli.ts',
        'packages/vitals/src/test/**',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
