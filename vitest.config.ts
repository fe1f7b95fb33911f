import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    // Rollout tests rely on short real timers; keep them off a shared pool
    fileParallelism: false,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
