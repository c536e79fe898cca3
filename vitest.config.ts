import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    clearMocks: true,
    restoreMocks: true,
    env: {
      LOG_SILENT: 'true',
      LOG_TO_FILE: 'false',
    },
  },
});
