import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    // Suites share one database; run them one file at a time
    pool: 'forks',
    fileParallelism: false,
  },
});
