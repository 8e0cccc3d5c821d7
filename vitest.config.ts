import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['shared/src/**/*.test.ts', 'device-worker/src/**/*.test.ts', 'supervisor-service/src/**/*.test.ts'],
  },
});
