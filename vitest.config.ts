import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const srcDir = (subPath: string): string =>
  fileURLToPath(new URL(`./src/${subPath}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@engine': srcDir('engine'),
      '@storage': srcDir('storage'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: './src/test/setup.ts',
  },
});
