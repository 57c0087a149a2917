import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'], // MCP servers run as ESM over stdio
  splitting: false,
  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',
  // Workspace packages are bundled in; published ones stay external
  noExternal: [/^@pagecut\//],
});
