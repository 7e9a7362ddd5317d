import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/src/**/*.spec.ts'],
  },
  resolve: {
    alias: {
      '@sml/ast': r('./packages/sml-ast/src/index.ts'),
      '@sml/parser': r('./packages/sml-parser/src/index.ts'),
    },
  },
});
