import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@crapscore\/parser$/, replacement: packageSource('parser') },
      { find: /^@crapscore\/core$/, replacement: packageSource('core') },
    ],
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    // tree-sitter parsers are native; keep them in one process per file
    pool: 'forks',
    testTimeout: 20000,
  },
});
