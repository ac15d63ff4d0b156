import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/matrix/index.ts',
    'src/reduce/index.ts',
    'src/search/index.ts',
    'src/flow/index.ts',
    'src/cut/index.ts',
  ],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: true,
  target: 'es2022',
});
