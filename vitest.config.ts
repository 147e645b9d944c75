import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    reporters: 'default',
    testTimeout: 20_000,
    env: {
      NODE_ENV: 'test',
      SECRET_KEY: 'test-secret'
    }
  }
});
