import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    isolate: true,
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts', 'packages/test-utils/**'],
    },
  },
  resolve: {
    alias: {
      // Use source files directly for tests (no build required)
      '@outlook-connector/core': packageSource('core'),
      '@outlook-connector/integrations': packageSource('integrations'),
      '@outlook-connector/mcp-tools': packageSource('mcp-tools'),
      '@outlook-connector/mcp-servers': packageSource('mcp-servers'),
      '@outlook-connector/test-utils': packageSource('test-utils'),
    },
  },
});
