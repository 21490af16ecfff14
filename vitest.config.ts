import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'html'],
      include: ['src/core/**/*.ts', 'src/lib/**/*.ts', 'src/middleware/**/*.ts', 'src/api/**/*.ts'],
      exclude: ['**/*.test.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
