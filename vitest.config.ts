import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['test/setup.ts'],
    // better-sqlite3 is a native addon; forks keep it out of worker threads
    pool: 'forks',
    restoreMocks: true,
    unstubGlobals: true,
  },
});
