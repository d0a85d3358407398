import { resolve } from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@crate-digger/shared': resolve(__dirname, 'shared/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/src/**/*.{spec,test}.ts', 'worker/src/**/*.{spec,test}.ts'],
    setupFiles: ['worker/src/test-setup.ts'],
  },
});
