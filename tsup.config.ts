import { defineConfig } from 'tsup';

export default defineConfig({
  // Entry points - what to build
  entry: {
    cli: 'src/cli/index.ts', // CLI entry -> dist/cli.js
    index: 'src/index.ts', // Library entry -> dist/index.js
  },

  // ESM only, matching "type": "module"
  format: ['esm'],

  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',

  // Makes dist/cli.js directly executable
  banner: {
    js: '#!/usr/bin/env node',
  },

  // Dependencies are installed via npm, not bundled
  external: ['commander', 'chalk', 'zod', 'dotenv', '@iarna/toml'],
});
