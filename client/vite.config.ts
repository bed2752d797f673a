import { defineConfig } from 'vite';

export default defineConfig({
  server: {
    host: true,
    port: 5173,
  },
  preview: {
    port: 4173,
  },
  optimizeDeps: {
    // three/webgpu and three must resolve to one pre-bundled copy so the
    // node-material singletons are shared between them.
    include: [
      'three',
      'three/webgpu',
    ],
  },
  build: {
    rollupOptions: {
      output: {
        manualChunks(id) {
          if (id.includes('node_modules/three/')) {
            return 'three';
          }
          if (id.includes('node_modules/troika-')) {
            return 'troika';
          }
        },
      },
    },
  },
});
