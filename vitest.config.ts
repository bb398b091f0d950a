import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@ipcalc/core': path.resolve(__dirname, 'packages/core/src/index.ts'),
        },
    },
    test: {
        include: ['packages/*/src/tests/**/*.test.ts'],
        environment: 'node',
    },
});
