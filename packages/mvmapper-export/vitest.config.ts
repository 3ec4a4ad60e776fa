import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'mvmapper-export',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 5_000,
    pool: 'forks',
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
  },
});
