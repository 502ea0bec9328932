import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts'],
    format: ['esm'],
    clean: true,
    // core ships TypeScript sources, so it is bundled rather than imported at run time
    noExternal: ['@codeshape/core']
});
