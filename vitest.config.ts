import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/bazelify/src/index.ts'],
        },
    },
    resolve: {
        alias: {
            '@bazelify/cli': resolve('./packages/cli/src/index.ts'),
            '@bazelify/generator': resolve('./packages/generator/src/index.ts'),
            '@bazelify/manifest': resolve('./packages/manifest/src/index.ts'),
            '@bazelify/resolver': resolve('./packages/resolver/src/index.ts'),
            '@bazelify/types': resolve('./packages/types/src/index.ts'),
            '@bazelify/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
