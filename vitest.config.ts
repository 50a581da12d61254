import { defineConfig } from 'vitest/config';
import baseConfig from './vitest.shared.config.js';

/**
 * Root configuration: runs the tests of every workspace package
 */
export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['node_modules', '**/dist/**'],
  },
});
