import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['agent/src/**/*.test.ts', 'backend/src/**/*.test.ts', 'shared/**/*.test.ts'],
        testTimeout: 10000,
    },
});
