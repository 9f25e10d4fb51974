/**
 * Vitest Configuration
 *
 * Projects:
 * - core: eightfold loader and engine tests
 * - cli: eightfold-cli tests
 *
 * Run one project:
 *   vitest run --project=core
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'core',
          globals: true,
          environment: 'node',
          include: ['packages/core/tests/**/*.test.ts'],
        },
      },
      {
        test: {
          name: 'cli',
          globals: true,
          environment: 'node',
          include: ['packages/cli/tests/**/*.test.ts'],
        },
      },
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
