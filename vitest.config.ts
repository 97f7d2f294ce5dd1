import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gobook/types': packageSource('types'),
      '@gobook/core': packageSource('core'),
      '@gobook/engine': packageSource('engine'),
      '@gobook/database': packageSource('database'),
      '@gobook/test-utils': packageSource('test-utils'),
      '@gobook/cli/orchestrator': fileURLToPath(
        new URL('./packages/cli/src/orchestrator/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 30000, // engine tests wait on timers
  },
});
