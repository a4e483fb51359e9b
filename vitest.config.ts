import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the workspace.
 *
 * Tests are colocated with the code they cover in `__tests__/` directories of
 * every app and package. Nothing here needs MongoDB: stores are in-memory and
 * mongoose is mocked where the loader is under test.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        reporters: 'default',
        env: {
            NODE_ENV: 'test'
        }
    }
});
