import { defineConfig } from 'tsup'
import { copyFileSync, mkdirSync } from 'fs'

export default defineConfig({
  entry: {
    cli: 'src/L7-app/cli.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: true,
  dts: true,
  banner: {
    js: '#!/usr/bin/env node',
  },
  // Keep node_modules external — they're runtime dependencies
  external: [
    /^[^./]/,
  ],
  onSuccess: async () => {
    // Keyword list for the speech analyzer
    mkdirSync('dist/assets', { recursive: true })
    copyFileSync('assets/keywords.json', 'dist/assets/keywords.json')
  },
})
