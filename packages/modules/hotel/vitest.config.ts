import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'module-hotel',
    environment: 'node',
    globals: true,
    include: ['src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
    },
  },
});
