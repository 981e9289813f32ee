import { defineConfig } from 'tsdown';

const isProd = process.env.TSDOWN_DEV !== 'true';

export default defineConfig({
  format: ['esm'],
  entry: ['./src/index.ts'],
  outDir: './dist',
  fixedExtension: true,
  dts: false,
  shims: true,
  clean: true,
  target: 'node20',
  platform: 'node',
  minify: isProd,
  sourcemap: !isProd,
  // Workspace sources are TypeScript, so they ship inside the bundle
  noExternal: ['arazzo-models'],
});
