import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    tsconfig: 'tsconfig.build.json',
    splitting: false,
    clean: true,
    sourcemap: true,
    skipNodeModulesBundle: true,
});
