import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'node',
    include: ['src/**/*.{spec,test}.ts?(x)'],
    environmentMatchGlobs: [['src/**/*.{spec,test}.tsx', 'jsdom']],
    setupFiles: ['./tests/setup-vitest.ts'],
  },
});
