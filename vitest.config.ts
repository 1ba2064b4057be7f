import { mkdirSync } from 'node:fs';
import { defineConfig, type UserConfig } from 'vitest/config';

// Ensure a stable, writable temp directory; the site fixtures live there.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest Configuration for docshelf
 *
 * Every test runs in process against throwaway sites under the temp dir.
 * Override the worker count with DOCSHELF_TEST_WORKERS.
 */
export default defineConfig((): UserConfig => {
  const envWorkers = parseInt(process.env.DOCSHELF_TEST_WORKERS ?? '', 10);
  const maxForks = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks',
      poolOptions: {
        forks: {
          maxForks,
          minForks: 1,
          isolate: true,
        },
      },
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'src/test/**',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
