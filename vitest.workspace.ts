/**
 * Vitest Workspace Configuration
 *
 * Each package runs its tests as its own project with shared settings.
 *
 * Workspace Projects:
 * - core: @tapewright/core package tests
 * - cli: @tapewright/cli package tests
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { fileURLToPath } from 'node:url';
import { defineWorkspace } from 'vitest/config';

// Package imports resolve to TypeScript sources so tests need no build
const alias = {
  '@tapewright/core': fileURLToPath(
    new URL('./packages/core/src/index.ts', import.meta.url)
  ),
};

export default defineWorkspace([
  {
    resolve: { alias },
    test: {
      name: 'core',
      globals: false,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  {
    resolve: { alias },
    test: {
      name: 'cli',
      globals: false,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
