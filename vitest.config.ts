import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Suppress stdout from passing tests
    silent: process.env.VERBOSE_TESTS === 'true' ? false : 'passed-only',
    // Hide skipped tests unless verbose mode
    hideSkippedTests: process.env.VERBOSE_TESTS !== 'true',
    // Test environment configuration
    environment: 'node',
    // Child processes in exec tests
    testTimeout: 15000,
    // Coverage configuration
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'tests/**'
      ]
    },
    // Include test files
    include: [
      'tests/**/*.{test,spec}.ts'
    ]
  }
});
