import { defineConfig } from 'vitest/config'

const BASE_EXCLUDE = [
  'src/**/*.test.ts',
  'src/**/*.d.ts',
  'src/__tests__/**',
]

// Thin wrappers around the ffmpeg / Whisper binaries and the CLI entry point
const EXTERNAL_WRAPPERS = [
  'src/L7-app/cli.ts',
  'src/L1-infra/ffmpeg/ffmpeg.ts',
  'src/L1-infra/ai/openai.ts',
]

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [...BASE_EXCLUDE, ...EXTERNAL_WRAPPERS],
      reportsDirectory: 'coverage',
    },
    testTimeout: 30000,

    // ── Per-tier test projects ──
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          setupFiles: ['src/__tests__/setup.ts'],
          testTimeout: 10_000,
        },
      },
      {
        extends: true,
        test: {
          name: 'integration-L3',
          include: ['src/__tests__/integration/L3/**/*.test.ts'],
          setupFiles: ['src/__tests__/setup.ts'],
          testTimeout: 30_000,
        },
      },
    ],
  },
})
