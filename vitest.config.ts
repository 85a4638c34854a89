import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@pipetrack/shared': fromRoot('./packages/shared/index.ts'),
      '@pipetrack/flow': fromRoot('./packages/flow/src/index.ts'),
      '@pipetrack/api': fromRoot('./packages/api/server/app.ts'),
      '@pipetrack/cli': fromRoot('./packages/cli/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
