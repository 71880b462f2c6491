import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/attach-configs.ts',
        'src/application/send-case-configs.ts',
        'src/application/query-configs.ts',
        'src/infrastructure/memory/**',
        'src/infrastructure/http/**',
        'src/frontend/realtime/**',
        'src/frontend/store/*-state.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
