import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    // Silence the structured logger unless a test opts back in
    env: {
      LOG_ENABLED: '0',
    },
  },
});
