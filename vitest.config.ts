import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // tree-sitter 是原生模块，放在子进程中加载
    pool: 'forks',
    testTimeout: 20000
  }
});
