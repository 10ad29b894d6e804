import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'src/cli.ts',
        'src/index.ts',
        'vitest.config.ts',
        'tests/**/*'
      ]
    },
    include: [
      'src/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist',
      '.git'
    ],
    // Config tests set process.env; keep files sequential
    fileParallelism: false
  }
});
