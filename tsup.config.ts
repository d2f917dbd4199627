import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// Runtime dependencies stay external; everything under the path aliases is bundled
const externalDependencies = [
  'chalk',
  'commander',
  'winston',

  // Node.js built-ins
  'fs',
  'path',
  'os',
  'crypto'
];

const internalAliases = [/^@core\//, /^@interpreter\//, /^@api\//, /^@cli\//];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

// Path aliases resolve through tsconfig.json
const applyEsbuildOptions = (options: EsbuildOptions): void => {
  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'es2022';
};

export default defineConfig([
  // Library build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    noExternal: internalAliases,
    esbuildOptions(options) {
      applyEsbuildOptions(options);
    }
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    noExternal: internalAliases,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions(options) {
      applyEsbuildOptions(options);
    }
  }
]);
