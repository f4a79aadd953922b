import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      // tsc emits compiled copies of the test files into dist/; running those
      // as well would execute every suite twice, once possibly stale.
      '**/dist/**',
    ],
    coverage: {
      exclude: [
        '**/*.test.ts',

        // Builders, constants and fixtures used only by tests
        'src/test-helpers/**',
        'src/**/__tests__/**',
      ],
      reporter: ['text', 'html'],
      reportsDirectory: './coverage',
    },
  },
});
