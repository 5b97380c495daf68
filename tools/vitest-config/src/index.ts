import type { UserConfig } from 'vitest/config';

const WORKSPACE_SOURCES = ['tools/*/src', 'packages/*/src', 'apps/*/src'];

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      setupFiles: ['./vitest.setup.ts'],
      pool: 'threads',
      include: WORKSPACE_SOURCES.map((dir) => `${dir}/**/*.{test,spec}.ts`),
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: WORKSPACE_SOURCES.map((dir) => `${dir}/**/*.ts`),
        exclude: [
          '**/*.test.ts',
          'packages/**/index.ts',
          '**/testing/**',
          'apps/cli/src/main.ts',
        ],
        thresholds: {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
      ...options.test,
    },
  };
};
