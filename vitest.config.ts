import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'services/*/src/**/__tests__/**/*.test.ts'],
    restoreMocks: true,
  },
});
