import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    // MuPDF compiles its WASM module on first use
    testTimeout: 20000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/*.schema.ts',
        '**/*.test.ts',
        '**/testing/**',
        '**/tsup.config.*',
      ],
    },
  },
});
