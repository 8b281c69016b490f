import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'data-pipelines/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
