import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['sqlserver-csv/typescript/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/dist/**'],
    testTimeout: 10000,
    hookTimeout: 10000,
    watch: false,
    clearMocks: true,
    restoreMocks: true,
  },
});
