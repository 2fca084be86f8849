import { defineConfig } from 'vite';
import solid from 'vite-plugin-solid';
import { fileURLToPath, URL } from 'node:url';

const devApiTarget = process.env.PROXMOX_DEV_API_URL ?? 'https://127.0.0.1:8006';

export default defineConfig({
  plugins: [solid()],
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
    conditions: ['import', 'browser', 'default'],
  },
  server: {
    proxy: {
      // The API server uses a self-signed certificate by default.
      '/api2': {
        target: devApiTarget,
        changeOrigin: true,
        secure: false,
      },
    },
  },
  build: {
    target: 'es2022',
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      formats: ['es'],
      fileName: 'index',
    },
    rollupOptions: {
      external: [/^solid-js/, /^lucide-solid/, 'dompurify', 'marked', 'qrcode'],
    },
  },
});
