import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts', '__tests__/**/*.test.ts'],
        pool: 'forks',
    },
});
