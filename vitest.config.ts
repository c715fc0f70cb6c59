import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gitsift/shared': workspace('shared'),
      '@gitsift/repo': workspace('repo'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/__fixtures__/**'],
  },
});
