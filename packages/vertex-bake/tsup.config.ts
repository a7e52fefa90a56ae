import { defineConfig } from 'tsup'

export default defineConfig([
  // Library build
  {
    name: 'library',
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    minify: false,
    treeshake: true,
    outDir: 'dist',
    external: ['three'],
    noExternal: ['@vertex-bake/deform-codec'],
  },
  // CLI build
  {
    name: 'cli',
    entry: ['src/cli.ts'],
    format: ['esm'],
    splitting: false,
    sourcemap: false,
    clean: false,
    minify: false,
    outDir: 'dist',
    platform: 'node',
    noExternal: ['@vertex-bake/deform-codec'],
  },
])
