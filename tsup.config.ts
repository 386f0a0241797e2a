import { defineConfig } from 'tsup';

// One ESM entry matching the package's "." export (dist/index.js and
// dist/index.d.ts). Runtime dependencies stay external.
export default defineConfig({
  entry: { index: 'src/index.ts' },
  outDir: 'dist',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  tsconfig: 'tsconfig.json',
  dts: { entry: { index: 'src/index.ts' } },
  clean: true,
  splitting: false,
  sourcemap: true
});
