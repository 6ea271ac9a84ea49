import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 is a native addon; child processes load it more reliably than worker threads
    pool: 'forks',
  },
});
