import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's built-in esbuild transform forces keepNames off, so esbuild renames
  // named function expressions that shadow an outer binding (`load` -> `load2`).
  // Transform TypeScript ourselves with keepNames so Function#name is preserved.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      enforce: 'pre',
      async transform(code, id) {
        if (!/\.[cm]?tsx?$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, { target: 'esnext', keepNames: true });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks',
  },
});
