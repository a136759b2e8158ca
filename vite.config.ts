import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';
import dts from 'vite-plugin-dts';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  build: {
    // Library mode
    lib: {
      entry: fromRoot('./src/index.ts'),
      name: 'FlatGrid',
      fileName: (format) => `index.${format === 'es' ? 'js' : 'cjs'}`,
    },
    rollupOptions: {
      // Peer-style dependency, not bundled
      external: ['arquero'],
      output: [
        {
          format: 'es',
          entryFileNames: 'index.js',
        },
        {
          format: 'cjs',
          entryFileNames: 'index.cjs',
        },
      ],
    },
    sourcemap: true,
    emptyOutDir: true,
  },

  plugins: [
    // Emit .d.ts next to the bundles
    dts({
      include: ['src/**/*'],
      exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    }),
  ],

  resolve: {
    alias: {
      '@': fromRoot('./src'),
    },
  },
});
