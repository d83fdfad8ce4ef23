import { defineConfig } from 'tsup';

// Single-file bundle of the CLI; `npm run build` (tsc) emits the full module tree instead.
export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  outDir: 'dist/bundle',
  sourcemap: true,
  clean: true,
  splitting: false,
});
