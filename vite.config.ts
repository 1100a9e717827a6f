import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  plugins: [
    dts({ include: ['src'], rollupTypes: true })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      formats: ['es'],
      fileName: 'index'
    },
    rollupOptions: {
      external: [/^node:/, 'better-sqlite3', 'debug', 'js-yaml', 'zod']
    }
  }
})
