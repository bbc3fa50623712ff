import type { UserConfig } from 'vitest/config';

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;

  return {
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.{ts,js,mjs}'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.{ts,js,mjs}'],
        exclude: ['src/index.ts', '**/index.ts'],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 85,
          statements: 90,
        },
      },
      ...test,
    },
    ...rest,
  };
};
