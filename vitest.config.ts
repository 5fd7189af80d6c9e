import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_TO_FILE: 'false',
            LOG_LEVEL: 'error'
        }
    }
});
