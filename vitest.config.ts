import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration: one run covers every workspace.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '**/__tests__/**',
        'apps/*/tests/**',
        '**/*.d.ts',
        '**/*.config.ts',
      ],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});
