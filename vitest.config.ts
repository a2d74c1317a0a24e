import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['world/**/*.test.ts', 'realtime-server/src/**/*.test.ts'],
  },
});
