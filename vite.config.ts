import { defineConfig } from 'vite'
import type { Plugin } from 'vite'
import dts from 'vite-plugin-dts'
import { cpSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

// month tables are read from disk beside the bundle
function copyCalendarData(): Plugin {
  return {
    name: 'copy-calendar-data',
    apply: 'build',
    writeBundle(options) {
      const outDir = options.dir ?? fileURLToPath(new URL('./dist', import.meta.url))
      cpSync(fileURLToPath(new URL('./src/data', import.meta.url)), `${outDir}/data`, {
        recursive: true,
        filter: (source) => !source.endsWith('.json'),
      })
    },
  }
}

export default defineConfig({
  plugins: [
    dts({ include: ['src'], rollupTypes: true }),
    copyCalendarData(),
  ],
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      formats: ['es'],
      fileName: 'index'
    },
    rollupOptions: {
      external: [/^node:/]
    }
  }
})
