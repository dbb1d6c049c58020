import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

// https://vitejs.dev/config/
export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, process.cwd(), '');
  const metabaseTarget = env.METABASE_PROXY_TARGET || 'http://localhost:3000';

  return {
    plugins: [react()],
    optimizeDeps: {
      exclude: ['lucide-react'],
      include: ['react', 'react-dom', '@supabase/supabase-js', 'recharts'],
    },
    server: {
      warmup: {
        clientFiles: ['./src/App.tsx', './src/main.tsx', './src/components/**/*.tsx'],
      },
      // Metabase does not send CORS headers; the browser talks to it through this proxy
      proxy: {
        '/metabase': {
          target: metabaseTarget,
          changeOrigin: true,
          rewrite: (path) => path.replace(/^\/metabase/, ''),
        },
      },
    },
    build: {
      rollupOptions: {
        output: {
          manualChunks: {
            'vendor-react': ['react', 'react-dom'],
            'vendor-supabase': ['@supabase/supabase-js'],
            'vendor-charts': ['recharts'],
            'vendor-export': ['jspdf'],
          },
        },
      },
      chunkSizeWarningLimit: 600,
    },
  };
});
