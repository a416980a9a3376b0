import { defineConfig } from 'tsup';

const shared = {
  splitting: false,
  sourcemap: true,
  shims: true,
  target: 'node20',
  outDir: 'dist',
} as const;

export default defineConfig([
  {
    ...shared,
    entry: { index: 'src/index.ts' },
    format: ['esm', 'cjs'],
    dts: true,
    clean: true,
  },
  // Only the CLI entry point gets a shebang
  {
    ...shared,
    entry: { cli: 'src/cli/index.ts' },
    format: ['esm'],
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);
