import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['Shared/tests/**/*.test.ts', 'CodeRunner/tests/**/*.test.ts', 'Chat/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
    // Runner tests spawn real child processes and time them
    fileParallelism: false,
  },
});
