import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    benchmark: {
      include: ['**/src/operations/**/*.bench.ts'],
    },
  },
});
