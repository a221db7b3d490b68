import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // vitest 使用 Vite 的解析器：把 `#backend/**.js` 映射为无扩展名路径，便于解析到 .ts 源文件
      { find: /^#backend\/(.*)\.js$/, replacement: path.resolve(rootDir, 'backend/$1') },
      { find: '#backend', replacement: path.resolve(rootDir, 'backend') },
    ],
  },
  test: {
    watch: false,
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup/env.ts'],
    poolOptions: {
      threads: {
        isolate: true,
      },
    },
  },
});
