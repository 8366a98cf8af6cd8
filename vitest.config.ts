import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        // Top-level re-exports
        'src/index.ts',
        'src/cli/index.ts',
        // Type-only files (interfaces, no executable code)
        'src/types/**',
        'src/search/embedders/embeddingProvider.ts',
        // CLI command handlers (require a running service)
        'src/cli/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
  resolve: {
    conditions: ['node'],
  },
});
