import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages run from their TypeScript sources, like the `source` export condition.
    alias: [
      {
        find: /^@docpatch\/document-model\/test-utils$/,
        replacement: source('./packages/document-model/src/test-utils/docx-fixtures.ts'),
      },
      { find: /^@docpatch\/document-model$/, replacement: source('./packages/document-model/src/index.ts') },
      { find: /^@docpatch\/change-engine$/, replacement: source('./packages/change-engine/src/index.ts') },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
});
