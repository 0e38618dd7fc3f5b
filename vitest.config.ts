import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/*/lib/**/*.test.ts', 'agent/src/**/*.test.ts'],
    environment: 'node',
  },
});
