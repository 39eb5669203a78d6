import { defineConfig } from 'tsup';

export default defineConfig({
    entry: { index: 'src/cli/index.ts' },
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    splitting: false,
    sourcemap: true,
    dts: false,
    banner: {
        js: '#!/usr/bin/env node',
    },
    // Native addon and worker-thread transports must resolve from node_modules
    external: ['better-sqlite3', 'pino', 'pino-pretty'],
});
