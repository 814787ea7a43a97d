import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    include: ['api/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
