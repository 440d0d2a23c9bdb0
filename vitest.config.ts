import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/server/plugins/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    unstubGlobals: true
  }
});
