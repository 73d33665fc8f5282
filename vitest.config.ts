import path from 'node:path';
import { defineConfig } from 'vitest/config';

const alias = {
  '@pipewright/http-middleware': path.resolve(__dirname, 'packages/http-middleware/src/index.ts'),
  '@pipewright/http-retry': path.resolve(__dirname, 'packages/http-retry/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
