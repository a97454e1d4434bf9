import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.spec.ts'],
    environment: 'node',
    // Worker threads run with a larger stack, which the parser's nesting-depth tests need
    pool: 'threads'
  }
});
