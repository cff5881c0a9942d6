import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Project mode for the monorepo
    projects: ['packages/@pixelprep/*/vitest.config.ts'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 70,
        functions: 70,
        statements: 70,
        branches: 60,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/test/**',
        '**/__tests__/**',
        'benchmark/**',
        'examples/**',
      ],
    },
  },
})
