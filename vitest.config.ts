import { mergeConfig } from 'vitest/config';

import baseConfig from './tooling/vitest.config.base.js';

export default mergeConfig(baseConfig, {
  test: {
    include: ['packages/*/tests/**/*.test.ts']
  }
});
