import { defineConfig } from 'vitest/config';
import baseConfig from '../../vitest.shared.config.js';

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    name: 'cli',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
