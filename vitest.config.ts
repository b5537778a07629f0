import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Unit tests only (no DB, no network). Integration tests live in *.int.test.ts
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/*.int.{test,spec}.ts'],
    setupFiles: ['src/test/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/test/**', 'src/scripts/**', 'src/main.ts'],
    },
  },
});
