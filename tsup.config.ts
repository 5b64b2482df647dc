import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  target: 'node20',
  // Node built-ins stay as imports
  external: ['fs', 'path', 'url'],
  esbuildOptions(options) {
    options.platform = 'node';
  },
});
