import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['framework/**/*.test.ts'],
    environment: 'node',
    env: {
      MINIFIER_SILENT: '1',
    },
  },
});
