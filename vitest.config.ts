import { defineConfig } from 'vitest/config';

// ── Coverage scope ──
// Entry points are thin commander wiring; everything below L7 is covered by unit + integration tiers.

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

const L7_ENTRY_POINTS = [
  'src/L7-app/cli.ts',
  'src/index.ts',
]

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [...BASE_EXCLUDE, ...L7_ENTRY_POINTS],
      reportsDirectory: 'coverage',
    },
    testTimeout: 30_000,
  },
});
