import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'vitest.performance.config.ts',
        'src/index.ts' // Server bootstrap, covered through the route tests
      ]
    },

    // Test file patterns; timing-based suites run through vitest.performance.config.ts
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**', 'src/**/*.performance.test.ts'],

    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',

    globals: true,

    watch: false
  }
});
