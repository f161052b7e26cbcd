import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    environment: 'node',
    // Loading the WASM grammar takes a moment on a cold start
    testTimeout: 20000,
    hookTimeout: 20000,
  },
});
