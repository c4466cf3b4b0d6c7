import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveFromRoot = (relativePath: string) =>
    fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            // Workspace packages resolve to their sources, so tests need no build
            {
                find: /^@msa-sdk\/client\/test-utils$/,
                replacement: resolveFromRoot('./packages/client/src/logger/test-utils.ts'),
            },
            {
                find: /^@msa-sdk\/client$/,
                replacement: resolveFromRoot('./packages/client/src/index.ts'),
            },
        ],
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
    },
});
