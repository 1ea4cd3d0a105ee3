import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        env: {
            ROLEGRAPH_LOG_LEVEL: 'silent',
            ROLEGRAPH_JSON_LOGS: '1',
        },
        testTimeout: 10000,
    },
});
