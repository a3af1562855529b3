import { defineConfig } from 'vitest/config';

// Coverage thresholds: stricter when CI=true
const isCI = process.env['CI'] === 'true';

const ciThresholds = {
  statements: 75,
  branches: 70,
  functions: 75,
  lines: 75,
};

const localThresholds = {
  statements: 65,
  branches: 60,
  functions: 65,
  lines: 65,
};

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['tests/setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/main.ts', 'node_modules', 'dist'],
      thresholds: isCI ? ciThresholds : localThresholds,
    },
  },
});
