import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // Serializing the workbook is the slow part; keep headroom on shared CI runners.
    testTimeout: 20_000,
    environment: 'node'
  }
});
