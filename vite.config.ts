import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      include: ['src/**/*']
    })
  ],
  build: {
    lib: {
      entry: 'src/index.ts',
      name: 'CodeBuilder',
      fileName: 'index',
      formats: ['es']
    },
    rollupOptions: {
      external: [/^node:/]
    }
  }
})
