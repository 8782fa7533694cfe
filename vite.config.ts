import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';

const src = fileURLToPath(new URL('./src', import.meta.url));

export default defineConfig({
  // Base path for assets. Static hosting under a sub-path passes VITE_BASE
  // as "/<repo-name>/"; locally it stays "/".
  base: process.env.VITE_BASE || '/',
  esbuild: {
    // drop console.debug in production builds
    pure: process.env.NODE_ENV === 'production' ? ['console.debug'] : [],
  },
  resolve: {
    alias: {
      '@': src,
    },
  },
  server: {
    port: 9876,
    host: true,
  },
  build: {
    target: 'es2020',
    outDir: 'dist',
    sourcemap: true,
  },
});
