import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    alias: [
      {
        find: /^@trackmark\/core$/,
        replacement: new URL('../core/src/index.ts', import.meta.url).pathname,
      },
      {
        find: /^@trackmark\/core\/testing$/,
        replacement: new URL('../core/src/testing/fakes.ts', import.meta.url).pathname,
      },
      {
        find: /^@trackmark\/providers$/,
        replacement: new URL('../providers/src/index.ts', import.meta.url).pathname,
      },
    ],
  },
});
