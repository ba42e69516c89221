import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    pool: 'forks',
    env: {
      HEAPFORM_LOG_LEVEL: 'silent',
    },
  },
});
