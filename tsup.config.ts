import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    cli: 'src/cli/index.ts', // -> dist/cli.js
    index: 'src/index.ts', // -> dist/index.js
  },

  format: ['esm'],
  dts: { entry: { index: 'src/index.ts' } },
  sourcemap: true,
  clean: true,
  target: 'node20',

  // Makes dist/cli.js directly executable
  banner: {
    js: '#!/usr/bin/env node',
  },

  // Dependencies are installed from npm, not bundled
  external: ['better-sqlite3', 'commander', 'chalk', 'ora', 'zod', 'marked', 'dotenv', '@iarna/toml'],
});
