import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSource = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@leadflow/types': resolveSource('./packages/types/src/index.ts'),
      '@leadflow/core': resolveSource('./packages/core/src/index.ts'),
      '@leadflow/domain': resolveSource('./packages/domain/src/index.ts'),
      '@leadflow/application': resolveSource('./packages/application/src/index.ts'),
      '@leadflow/infrastructure': resolveSource('./packages/infrastructure/src/index.ts'),
    },
  },
});
