import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    // Dispatch and exec tests spawn real shells
    testTimeout: 15000,
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
    include: [
      'tests/**/*.{test,spec}.ts'
    ]
  }
});
