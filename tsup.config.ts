import { defineConfig } from 'tsup';

export default defineConfig([
  {
    // 库入口
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: true,
    sourcemap: true,
    target: 'node20',
    outDir: 'dist',
  },
  {
    // CLI 入口
    entry: { cli: 'src/cli/index.ts' },
    format: ['esm'],
    sourcemap: true,
    target: 'node20',
    outDir: 'dist',

    // 添加 shebang
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);
