import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from './vitest.base.js';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    include: ['Shared/tests/**/*.test.ts', 'Compiler-MCP/tests/**/*.test.ts'],
    fileParallelism: false,
  },
}));
