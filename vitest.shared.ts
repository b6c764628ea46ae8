import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { jsToTsResolver } from './scripts/vite-js-to-ts-resolver.js'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  test: {
    alias: {
      // point workspace packages at their sources so tests never need a build
      '@featurekit/core': path.resolve(rootDir, './packages/featurekit-core/src/index.ts'),
      '@featurekit/test': path.resolve(rootDir, './packages/featurekit-test/src/index.ts'),
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
}
