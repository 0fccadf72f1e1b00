import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['os-smoke/src/**/*.test.ts'],
    environment: 'node'
  }
});
