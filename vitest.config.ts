import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    env: { DTCG_LS_LOG_LEVEL: 'silent' },
    include: ['lib/**/__tests__/**/*.test.ts', 'language-server/**/__tests__/**/*.test.ts'],
  },
});
