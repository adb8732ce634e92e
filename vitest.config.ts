import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // vitest's default exclude contains '**/dist/**', which would drop tests/dist/
        exclude: ['**/node_modules/**', './dist/**'],
    },
});
