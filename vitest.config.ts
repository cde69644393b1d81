import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@send-attributes/shared': fileURLToPath(new URL('./shared/src/index.ts', import.meta.url)),
    },
  },
});
