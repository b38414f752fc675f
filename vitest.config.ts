import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // esbuild renames shadowed class declarations (Widget -> Widget2); swc keeps
  // class names as written, which the tests compare against
  plugins: [swc.vite({ jsc: { target: 'es2022' } })],
  esbuild: false,
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    // ts-morph type-checks fixture sources, which is slow on a cold start
    testTimeout: 30_000,
  },
});
