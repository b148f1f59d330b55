import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import path from 'node:path'

let root = path.dirname(fileURLToPath(import.meta.url))

/** Library build: ESM modules under `dist/` with declarations beside them. */
export default defineConfig({
  build: {
    rollupOptions: {
      output: {
        entryFileNames: '[name].js',
        preserveModules: true,
      },
      external: id => !id.startsWith('.') && !path.isAbsolute(id),
    },
    lib: {
      entry: {
        'cli/index': path.resolve(root, 'cli/index.ts'),
        'core/index': path.resolve(root, 'core/index.ts'),
      },
      formats: ['es'],
    },
    target: 'node20',
  },
  plugins: [
    dts({
      include: ['cli', 'core', 'types'],
      copyDtsFiles: true,
    }),
  ],
})
