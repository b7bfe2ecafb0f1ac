import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const srcDir = (sub: string) => fileURLToPath(new URL(`./src/${sub}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/index.ts'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
  resolve: {
    alias: {
      '@domain': srcDir('domain'),
      '@infra': srcDir('infrastructure'),
      '@features': srcDir('features'),
      '@shared': srcDir('shared'),
      '@cli': srcDir('cli'),
    },
  },
});
