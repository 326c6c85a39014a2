import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/domain/registry/types.ts',
        'src/domain/vcs/types.ts',
        'src/domain/scripts/types.ts',
        'src/domain/lifecycle/types.ts',
      ],
      reporter: ['text', 'json', 'html'],
    },
    testTimeout: 10000,
  },
});
