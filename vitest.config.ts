import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // PBKDF2 at vault-grade iteration counts takes a noticeable slice of a second
    testTimeout: 60000,
    hookTimeout: 60000,
  },
});
