import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    server: {
        port: 3000,
        open: true,
    },
    build: {
        target: 'esnext',
    },
    // Vitest configuration
    test: {
        environment: 'jsdom',
        globals: true,
        include: ['src/**/*.test.ts', 'perf/**/*.test.ts'],
    },
});
