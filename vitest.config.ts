import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/*.test.ts', 'backend/scripts/**/*.test.ts'],
    environment: 'node',
  },
});
