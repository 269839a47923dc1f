import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // -------------------------------------------------------------------------
    // Execution environment
    // -------------------------------------------------------------------------
    environment: 'node',

    // -------------------------------------------------------------------------
    // Test discovery
    // Explicit patterns avoid accidental execution of helper files.
    // -------------------------------------------------------------------------
    include: ['src/**/*.test.ts', 'src/**/*.test.tsx'],
    exclude: ['node_modules/**', 'dist/**', 'coverage/**', 'logs/**', '**/*.d.ts'],

    // -------------------------------------------------------------------------
    // Coverage (opt-in via `npm run test:coverage`)
    // -------------------------------------------------------------------------
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: [
        '**/*.d.ts',
        '**/*.test.*',
        '**/types.ts',
        '**/__test-utils__/**',
        // Barrel files (re-export only, no executable code)
        'src/index.ts',
        'src/matrix/index.ts',
        'src/job/index.ts',
        'src/coverage/index.ts',
        'src/docs/index.ts',
        'src/cli/config/index.ts',
        'src/cli/core/index.ts',
        'src/cli/execution/index.ts',
        'src/cli/input/index.ts',
        'src/cli/modules/index.ts',
        'src/cli/observability/index.ts',
        'src/cli/output/index.ts',
      ],
      reportsDirectory: 'coverage',
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // -------------------------------------------------------------------------
    // Globals
    // Allowed explicitly to reduce boilerplate.
    // -------------------------------------------------------------------------
    globals: true,

    // -------------------------------------------------------------------------
    // Determinism & safety
    // -------------------------------------------------------------------------
    clearMocks: true,
    restoreMocks: true,
  },
});
