import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against the sources, not the compiled package
      '@leadflow/engine': resolve(root, 'engine/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['engine/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
