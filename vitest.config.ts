import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@mytypes': fromRoot('./src/mytypes'),
      '@tmfunctions': fromRoot('./src/tmfunctions'),
      '@utils': fromRoot('./src/utils'),
      '@zustands': fromRoot('./src/zustands'),
    },
  },
});
