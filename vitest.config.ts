import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['textcore/tests/**/*.test.ts'],
    environment: 'node',
  },
});
