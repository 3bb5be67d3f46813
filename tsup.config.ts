import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/splitting/index.ts'],
  format: ['esm'],
  dts: { entry: 'src/splitting/index.ts' },
  clean: true,
  sourcemap: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  external: [
    // All dependencies should be external for CLI tool
    'chalk',
    'commander',
    'gpt-tokenizer',
    'strip-ansi',
    'zod'
  ]
});
