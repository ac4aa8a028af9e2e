import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@concursal/domain': fromRoot('./packages/domain/src'),
      '@concursal/expression': fromRoot('./packages/expression/src'),
      '@concursal/rulebook': fromRoot('./packages/rulebook/src'),
      '@concursal/citations': fromRoot('./packages/citations/src'),
      '@concursal/rule-engine': fromRoot('./packages/rule-engine/src'),
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'services/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    globals: false,
  },
});
