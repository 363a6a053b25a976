import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/**/__tests__/*.spec.ts'],
    environment: 'node',
  },
});
