import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'error',
            NODE_ENV: 'test',
        },
    },
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
