import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Every suite opens its own in-memory SQLite database, so unit and
    // HTTP tests share one run.
    include: ['src/**/*.{test,spec}.ts'],
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
