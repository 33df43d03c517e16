import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Tests share loopback servers; keep them in one fork at a time
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    fileParallelism: false,
    testTimeout: 10_000,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**',
        'src/index.ts',
        'src/constants.ts', // Constants only
        'src/bin/**', // Process entry point
      ],
      all: true,
    },
  },
});
