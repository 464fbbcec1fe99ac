import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,

    // Suppress console output from tests (step logs, script output)
    onConsoleLog: () => false,
  },
});
