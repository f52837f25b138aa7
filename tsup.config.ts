// tsup.config.ts
import {defineConfig} from 'tsup';

export default defineConfig([
    {
        entry: ['src/index.ts'],
        outDir: 'dist',
        format: ['esm', 'cjs'],
        dts: true,
        sourcemap: true,
        clean: true,
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension({format}) {
            return {
                js: format === 'esm' ? '.mjs' : '.cjs',
            };
        },
    },

    // CLI build (tforge command); ESM only so TS manifests can be imported
    {
        entry: {
            cli: 'src/cli/main.ts',
        },
        outDir: 'dist',
        format: ['esm'],
        dts: false,
        sourcemap: true,
        clean: false, // keep the lib build
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension() {
            return {js: '.mjs'};
        },
    },
    {
        entry: {
            ast: 'src/ast/index.ts',
        },
        outDir: 'dist',
        format: ['esm', 'cjs'],
        dts: true,
        sourcemap: true,
        clean: false,
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension({format}) {
            return {
                js: format === 'esm' ? '.mjs' : '.cjs',
            };
        },
    },
]);
