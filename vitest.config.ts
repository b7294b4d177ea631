import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // All tests; Postgres tests in *.int.test.ts skip themselves without DATABASE_URL
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
