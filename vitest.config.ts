import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@refactor-gate/domain': path.resolve(root, 'packages/domain/src/index.ts'),
      '@refactor-gate/common': path.resolve(root, 'packages/common/src/index.ts'),
      '@refactor-gate/protocol': path.resolve(root, 'packages/protocol/src/index.ts'),
      '@refactor-gate/analysis': path.resolve(root, 'packages/analysis/src/index.ts'),
      '@refactor-gate/web': path.resolve(root, 'services/web/src/server.ts'),
      '@refactor-gate/cli': path.resolve(root, 'services/cli/src/cli.ts')
    }
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'services/*/test/**/*.test.ts'],
    testTimeout: 20000
  }
});
