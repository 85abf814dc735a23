import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },
    include: [
      'packages/*/test/**/*.test.ts',
      'audio/test/**/*.test.ts',
      'gateway/test/**/*.test.ts'
    ],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true
      }
    }
  },
  resolve: {
    alias: {
      '@tenantune/logger': path.resolve(rootDir, 'packages/logger/src/index.ts'),
      '@tenantune/config': path.resolve(rootDir, 'packages/config/src/index.ts'),
      '@tenantune/cache': path.resolve(rootDir, 'packages/cache/src/index.ts'),
      '@tenantune/audio': path.resolve(rootDir, 'audio/src/index.ts')
    }
  }
});
