// vite.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['src/__tests__/setupTests.ts'],
    setupFiles: ['src/__tests__/setupTests.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
      exclude: [
        '**/node_modules/**',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/vite.config.ts',
        './src/index.ts',
      ],
    },
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
    isolate: true,
    // Test timeout parameters (in milliseconds)
    testTimeout: 15000,
  },
});
