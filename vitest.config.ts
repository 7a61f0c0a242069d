import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keep pino quiet unless a test reconfigures it
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
