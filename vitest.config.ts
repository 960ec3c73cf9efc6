import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveSource = (directory: string) => fileURLToPath(new URL(`./src/${directory}`, import.meta.url));

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    mockReset: true,
    coverage: {
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{schema,types,error,const}.ts', 'src/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@constants': resolveSource('constants'),
      '@models': resolveSource('models'),
      '@errors': resolveSource('errors'),
      '@utils': resolveSource('utils'),
      '@services': resolveSource('services'),
    },
  },
});
