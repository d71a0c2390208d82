import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/graph/index.ts',
    'src/degree/index.ts',
    'src/euler/index.ts',
    'src/assemble/index.ts',
    'src/kmer/index.ts',
    'src/io/index.ts',
    'src/errors/index.ts',
  ],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: true,
  target: 'es2022',
});
