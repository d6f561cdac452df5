import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const workspaceRoot = path.resolve(fileURLToPath(new URL('.', import.meta.url)), '..');
const packageEntry = (name: string) => path.join(workspaceRoot, 'packages', name, 'src/index.ts');

const resolveAlias = {
  '@loadwire/core-logging': packageEntry('core-logging'),
  '@loadwire/core-validation': packageEntry('core-validation'),
  '@loadwire/core-errors': packageEntry('core-errors'),
  '@loadwire/core-metrics': packageEntry('core-metrics'),
  '@loadwire/core-client': packageEntry('core-client')
};

export default defineConfig({
  resolve: {
    alias: resolveAlias
  },
  test: {
    environment: 'node',
    globals: true,
    reporters: ['default'],
    coverage: {
      reporter: ['text', 'lcov'],
      exclude: ['**/tests/**', '**/*.d.ts']
    }
  }
});
