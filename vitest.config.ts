import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against workspace sources, not the built dist/.
    conditions: ['dshop-source'],
    alias: [
      {
        find: /^@dshop\/core$/,
        replacement: fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    env: {
      DOMENESHOP_AUDIT: 'off',
      NO_COLOR: '1',
    },
    restoreMocks: true,
  },
});
