import { defineConfig } from 'tsup'

/**
 * Bundle configuration for publishing
 *
 * - Dual CJS/ESM output with declarations
 * - `src/core` and `src/numeric` are exposed as sub-path entries
 */
export default defineConfig({
    name: 'rootsolve',

    entry: {
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/numeric': 'src/numeric/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',

    platform: 'neutral',
})
