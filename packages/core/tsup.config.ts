import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'transport/index': 'src/transport/index.ts',
    'grounding/index': 'src/grounding/index.ts',
    'honesty/index': 'src/honesty/index.ts',
    'client/index': 'src/client/index.ts',
    'dispatcher/index': 'src/dispatcher/index.ts',
    'utils/index': 'src/utils/index.ts',
  },
  format: ['esm'],
  dts: true,
  splitting: true,
  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',
  external: [
    'zod',
    // Test frameworks should never be bundled
    'vitest',
  ],
  skipNodeModulesBundle: true,
  treeshake: true,
});
