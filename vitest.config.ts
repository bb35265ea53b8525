import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/*/tests/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    testTimeout: 10000,
  },
});
