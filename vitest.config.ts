import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export their build output; tests run against the sources instead.
const source = (entry: string) => fileURLToPath(new URL(`./packages/${entry}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@paperqa/tools-core': source('tools-core/src/index.ts'),
      '@paperqa/tools-adaptor-mcp': source('tools-adaptor-mcp/src/index.ts'),
      '@paperqa/tools-rag': source('tools-rag/src/index.ts'),
      '@paperqa/tools-rag-mcp': source('tools-rag-mcp/src/server.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      // Only package sources count towards coverage
      include: ['packages/*/src/**'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/*.test.ts',
        '**/coverage/**',
        '**/vitest.config.*',
      ],
    },
  },
});
