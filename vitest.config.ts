import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@newscheck\/([^/]+)\/(.*)$/, replacement: `${packagesDir}/$1/$2` }],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules'],
  },
});
