import { defineConfig } from 'vite'

export default defineConfig({
  build: {
    target: 'es2022',
    lib: {
      entry: 'src/index.ts',
      formats: ['es'],
      fileName: 'latex-ref-cycle',
    },
    rollupOptions: {
      external: [/^monaco-editor/],
      output: {
        globals: {
          'monaco-editor': 'monaco',
        },
      },
    },
  },
})
