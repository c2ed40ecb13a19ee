import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/unit/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/lib/**/*.ts', 'src/content/**/*.ts', 'src/commands/**/*.ts'],
      exclude: ['src/bin.ts', 'src/types/**'],
      thresholds: { lines: 80, statements: 80, branches: 70 },
    },
  },
});
