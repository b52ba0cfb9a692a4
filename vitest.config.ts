import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'detection-orchestrator',
    globals: false,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    hookTimeout: 10000,
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
    watch: false
  }
});
