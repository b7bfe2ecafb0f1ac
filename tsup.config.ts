import { defineConfig } from 'tsup';

const shared = {
  format: ['esm' as const],
  sourcemap: true,
  target: 'node20',
};

export default defineConfig([
  {
    ...shared,
    entry: { index: 'src/index.ts' },
    dts: true,
  },
  {
    ...shared,
    entry: { 'cli/index': 'src/cli/index.ts' },
    // Shebang only on the CLI entry point
    banner: { js: '#!/usr/bin/env node' },
  },
]);
