import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Supervisor tests spawn real child processes and poll their liveness.
    testTimeout: 20000,
    hookTimeout: 20000,
    pool: 'forks',
    setupFiles: ['tests/setup/process-title.ts'],
  },
});
