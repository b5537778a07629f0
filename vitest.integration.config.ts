import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Needs DATABASE_URL pointing at a disposable database
    setupFiles: ['src/test/setup.ts'],
    pool: 'forks',
    maxWorkers: 1, // Tests share one database
    maxConcurrency: 1,
  },
});
