import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Resource limits - the suite is small and fully mocked
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**',
        'src/constants.ts', // Constants only
        'src/cli/**', // CLI not unit testable
        'src/utils/colors.ts', // Color detection at module load time
        'src/**/index.ts', // Re-export files
      ],
      all: true,
    },
  },
});
