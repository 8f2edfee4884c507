import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  // The library ships TypeScript sources, so it has to be compiled into the bin.
  noExternal: ['witness-rotator'],
  sourcemap: true,
  clean: true,
  treeshake: true,
})
