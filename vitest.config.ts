import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'unit',
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // Only the stub-server tests touch real sockets
    testTimeout: 10000,
    maxConcurrency: 5,
    retry: 0
  }
});
