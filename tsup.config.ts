import { defineConfig } from 'tsup'

export default defineConfig([
  // Library build (CJS + ESM)
  {
    entry: { index: 'src/index.ts' },
    format: ['cjs', 'esm'],
    dts: true,
    clean: true,
    outDir: 'dist',
    splitting: false,
    sourcemap: true,
    target: 'node20',
    platform: 'node',
    outExtension({ format }) {
      return format === 'cjs' ? { js: '.cjs', dts: '.d.cts' } : { js: '.mjs', dts: '.d.mts' }
    },
  },
  // saturn-moons CLI (CJS, with shebang); dependencies stay external
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['cjs'],
    dts: false,
    outDir: 'dist',
    splitting: false,
    target: 'node20',
    platform: 'node',
    banner: {
      js: '#!/usr/bin/env node',
    },
    outExtension() {
      return { js: '.cjs' }
    },
  },
])
