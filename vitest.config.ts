import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup.ts'],
  },
  resolve: {
    alias: {
      '@libs/core': path.resolve(__dirname, 'libs/core/src'),
      '@libs/market-data': path.resolve(__dirname, 'libs/market-data/src'),
      '@libs/signals': path.resolve(__dirname, 'libs/signals/src'),
    },
  },
});
