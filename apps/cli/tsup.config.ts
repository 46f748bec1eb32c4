import { defineConfig } from 'tsup';
import { readFileSync } from 'node:fs';

// Read package.json version at build time
const packageJson: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  treeshake: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  // Bundle workspace packages so the published CLI is self-contained
  noExternal: ['@groundcheck/core', '@repo/shared-config'],
  define: {
    'process.env.NODE_ENV': JSON.stringify(process.env.NODE_ENV || 'production'),
    '__CLI_VERSION__': JSON.stringify(packageJson.version),
  },
});
