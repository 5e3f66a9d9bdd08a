import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import path from 'node:path'

/** Directory of this configuration file. */
let root = path.dirname(fileURLToPath(import.meta.url))

/**
 * Check if a module is external.
 *
 * @param id - The module ID.
 * @returns True if the module is external, false otherwise.
 */
function external(id: string): boolean {
  return !id.startsWith('.') && !path.isAbsolute(id)
}

/** Vite configuration. */
export default defineConfig({
  build: {
    rollupOptions: {
      output: {
        entryFileNames: '[name].js',
        preserveModulesRoot: root,
        preserveModules: true,
        exports: 'auto',
      },
      external,
    },
    lib: {
      entry: [
        path.resolve(root, 'cli/index.ts'),
        path.resolve(root, 'core/index.ts'),
      ],
      formats: ['es'],
    },
    target: 'node20',
    minify: true,
  },
  plugins: [
    dts({
      include: [
        path.resolve(root, 'cli'),
        path.resolve(root, 'core'),
        path.resolve(root, 'types'),
      ],
      copyDtsFiles: true,
    }),
  ],
})
