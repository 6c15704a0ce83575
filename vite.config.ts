import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  server: {
    port: 3000,
    host: true,
  },
  build: {
    outDir: 'dist',
  },
  test: {
    environment: 'jsdom',
    include: ['frontend/tests/**/*.test.{ts,tsx}'],
    setupFiles: ['frontend/tests/setup.ts'],
  },
});
