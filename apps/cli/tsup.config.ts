import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  platform: 'node',
  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',
  // The workspace library ships TypeScript sources, so it is bundled in
  noExternal: ['@potcheck/manifest'],
});
