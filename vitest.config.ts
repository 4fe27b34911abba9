import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'tools/*/src/**/*.{test,spec}.ts',
    ],
    environment: 'node',
    restoreMocks: true,
  },
});
