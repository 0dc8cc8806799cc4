import { defineConfig } from 'tsup'

/**
 * tsup configuration for the stepstack library
 *
 * - splitting: true → Shared code goes to chunks used by every entry
 * - dts: true → Declaration files next to each bundle
 */
export default defineConfig({
    name: 'stepstack',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/multistep': 'src/multistep/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2022',

    // No runtime dependencies: the output runs in Node.js and in browsers
    platform: 'neutral',
})
