import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': new URL('./src', import.meta.url).pathname,
    },
  },
  test: {
    environment: 'jsdom',
    globals: true,
    setupFiles: './src/setupTests.ts',
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.spec.ts', '**/*.test.ts'],
      reporter: ['text', 'json-summary'],
      reportsDirectory: './coverage',
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
