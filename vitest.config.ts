import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./src/test-setup.ts'],
    include: ['src/**/*.test.ts'],
    // Runtime state the bot writes next to the checkout.
    exclude: [
      ...configDefaults.exclude,
      'data/**',
      'dist/**',
    ],
    // better-sqlite3 is a native addon; forks keep each worker's handles isolated.
    pool: 'forks',
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: 4,
      },
    },
  },
});
