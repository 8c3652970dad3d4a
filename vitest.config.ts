/**
 * Shared Vitest configuration.
 * Each package runs as its own project (see vitest.workspace.ts).
 * Workspace packages resolve to their sources, so tests need no build.
 */
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'forthic-tokenizer': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
  },
});
