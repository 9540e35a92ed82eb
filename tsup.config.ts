import { defineConfig } from 'tsup'

/**
 * Bundle configuration for gridfield-nav
 *
 * - browser: pure planning pipeline, no Node.js built-ins
 * - index/node: add scenarios, map loading and waypoint export (node also the file logger)
 * - cli: scenario runner executable
 */
export default defineConfig({
    name: 'gridfield-nav',

    entry: {
        // ==================== Main Entries ====================
        index: 'index.ts',
        node: 'node.ts',
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/navigation': 'src/navigation/index.ts',
        'src/tasks': 'src/tasks/index.ts',

        // ==================== CLI ====================
        cli: 'src/tasks/scenarios/cli.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime, never bundled
    external: [
        'fs',
        'path',
    ],

    outDir: 'dist',
    target: 'es2020',
    platform: 'neutral',

    // __dirname is used to locate bundled scenario maps
    shims: true,
})
