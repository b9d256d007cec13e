import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * tracefit Vitest configuration
 *
 * - Deterministic runs: fixed seed, no retries
 * - Extended timeouts for property-based testing
 * - Workspace packages resolved through tsconfig paths
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool: process.platform === 'win32' ? 'threads' : 'forks',
    setupFiles: ['./test/setup.ts'],

    // Test files pattern - includes all packages in the workspace
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],
    watch: false,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/types.ts',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
