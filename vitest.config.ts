import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages run from their sources: no build before tests
const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            { find: /^@txn-directives\/shared$/, replacement: source('shared') },
            { find: /^@txn-directives\/core$/, replacement: source('core') },
        ],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
        },
    },
});
