import { defineConfig } from 'tsup';

export default defineConfig([
  // Main library entry
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    splitting: false,
    treeshake: true,
    minify: false,
    external: ['zstd-napi', 'tar', 'unzipper'],
  },
  // CLI entry (separate to add shebang)
  {
    entry: { 'cli/index': 'src/cli/index.ts' },
    format: ['esm'],
    dts: false,
    sourcemap: false,
    splitting: false,
    treeshake: true,
    minify: false,
    external: ['zstd-napi', 'tar', 'unzipper'],
    banner: {
      js: '#!/usr/bin/env node',
    },
    // Prevent clean to not delete other builds
    clean: false,
  },
]);
