import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core-service/test/**/*.test.ts', 'loyalty-service/test/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
