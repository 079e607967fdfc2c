import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'revision-diff-engine',
    root: './',
    environment: 'node',
    include: ['main/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['main/**/*.ts', 'shared/**/*.ts'],
      exclude: ['**/__tests__/**', '**/*.d.ts', '**/dist/**'],
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },
    setupFiles: ['./test/setup.ts'],
    mockReset: true,
    restoreMocks: true,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
