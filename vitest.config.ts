import { defineConfig } from 'vitest/config';
import * as path from 'path';

export default defineConfig({
    resolve: {
        alias: {
            'linepipe-core': path.resolve(__dirname, 'packages/linepipe-core/src/index.ts'),
        },
    },
    test: {
        globals: false,
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        testTimeout: 10000,
    },
});
