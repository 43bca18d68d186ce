import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['archive/**/*.test.ts', 'server/**/*.test.ts'],
    },
});
