import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every workspace's colocated tests with these
 * defaults. The backend keeps its own vitest.config.ts for running from
 * apps/backend.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 10_000,
        hookTimeout: 10_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test'
        }
    }
});
