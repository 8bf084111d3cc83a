/// <reference types="vitest/config" />
/**
 * Root Vitest: one node project covering every workspace package.
 * Child packages do NOT need vitest.config.ts.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const Dirname = path.dirname(fileURLToPath(import.meta.url));

// --- [CONSTANTS] -------------------------------------------------------------

const B = Object.freeze({
    cacheDir: 'node_modules/.vitest',
    optimizeDeps: ['@effect/vitest', '@fast-check/vitest', 'effect', 'fast-check'],
    output: {
        chaiConfig: { includeStack: true, showDiff: true, truncateThreshold: 0 },
        diff: { expand: true, truncateThreshold: 0 },
    },
    patterns: {
        coverageExclude: ['**/*.config.*', '**/*.d.ts', '**/dist/**', '**/node_modules/**', '**/tests/**'],
        coverageInclude: ['packages/**/src/**/*.ts'],
        testExclude: ['**/node_modules/**', '**/dist/**'],
        testInclude: ['packages/*/tests/**/*.spec.ts'],
    },
    reporters: { coverage: ['text', 'json', 'html', 'lcov'] as const },
    setupFiles: [path.resolve(Dirname, 'packages/test-utils/src/setup.ts')],
    timeouts: { hook: 10_000, slow: 5_000, test: 10_000 },
} as const);

// --- [EXPORT] ----------------------------------------------------------------

export default defineConfig({
    cacheDir: B.cacheDir,
    optimizeDeps: { include: [...B.optimizeDeps] },
    test: {
        allowOnly: process.env['CI'] !== 'true',
        chaiConfig: { ...B.output.chaiConfig },
        clearMocks: true,
        coverage: {
            clean: true,
            enabled: false,
            exclude: [...B.patterns.coverageExclude],
            include: [...B.patterns.coverageInclude],
            provider: 'v8',
            reporter: [...B.reporters.coverage],
            reportsDirectory: path.resolve(Dirname, 'coverage'),
        },
        diff: { ...B.output.diff },
        environment: 'node',
        exclude: [...B.patterns.testExclude],
        fileParallelism: true,
        globals: true,
        hookTimeout: B.timeouts.hook,
        include: [...B.patterns.testInclude],
        isolate: true,
        mockReset: true,
        name: 'packages-node',
        passWithNoTests: false,
        pool: 'threads',
        restoreMocks: true,
        root: Dirname,
        sequence: { concurrent: false, hooks: 'stack', shuffle: false },
        setupFiles: [...B.setupFiles],
        slowTestThreshold: B.timeouts.slow,
        testTimeout: B.timeouts.test,
        unstubEnvs: true,
        unstubGlobals: true,
    },
});

export { B as VITEST_TUNING };
