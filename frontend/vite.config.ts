import path from 'path';
import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

export default defineConfig(({ mode }) => {
    const env = loadEnv(mode, process.cwd(), '');

    return {
      root: __dirname,
      plugins: [react()],
      css: {
        postcss: path.resolve(__dirname, 'postcss.config.cjs'),
      },
      define: {
        // read by src/config.ts; empty means "let the user edit it"
        'process.env.GATEWAY_URL': JSON.stringify(env.GATEWAY_URL ?? ''),
      },
      server: {
        host: '0.0.0.0',
        port: 5173,
      },
      build: {
        outDir: path.resolve(__dirname, '../dist/web'),
        emptyOutDir: true,
      },
      resolve: {
        alias: {
          '@': path.resolve(__dirname, 'src'),
        }
      }
    };
});
