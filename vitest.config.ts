import { defineConfig } from 'vitest/config';

/**
 * Unit tests cover each pipeline stage against the JSON tables in settings/.
 * Integration tests drive the orchestration layer with in-process backends.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['tests/**', 'dist/**', '**/*.config.ts', '**/*.d.ts'],
    },
    testTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
  },
});
