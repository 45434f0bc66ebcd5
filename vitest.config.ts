import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
      'packages/**/tests/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 5000,
    env: {
      NODE_ENV: 'test',
      LOG_CONSOLE: 'false',
      LOG_FILE: 'false',
    },
  },
  resolve: {
    alias: {
      '@crossbar/utils': resolveFromRoot('packages/utils/src'),
      '@crossbar/core': resolveFromRoot('packages/core/src'),
      '@crossbar/simulation': resolveFromRoot('packages/simulation/src'),
      '@crossbar/cli': resolveFromRoot('packages/cli/src'),
    },
  },
});
