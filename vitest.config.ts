import { defineConfig } from 'vitest/config';

// Test workers inherit this zone; it skips local midnight on 2018-11-04.
process.env['TZ'] = 'America/Sao_Paulo';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
