import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['shared/src/**/*.test.ts', 'server/src/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
        },
    },
});
