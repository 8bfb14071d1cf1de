import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'bundle',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // Native addon and pino's transport worker are resolved at runtime
    external: ['better-sqlite3', 'pino', 'pino-pretty'],
});
