import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['mesh/**/*.test.ts'],
        testTimeout: 20000,
    },
});
