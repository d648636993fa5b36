import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['keysound-cli/tests/**/*.test.ts'],
    environment: 'node',
  },
});
