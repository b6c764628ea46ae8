import fs from 'node:fs'
import path from 'node:path'
import type { Plugin } from 'vite'

const stripQuery = (id: string): string => id.split('?', 1)[0] ?? id

/**
 * Sources import siblings with a `.js` suffix (Node ESM style); when the `.js` file does not exist on disk
 * this resolver falls back to the `.ts` source next to it.
 */
export const jsToTsResolver = (): Plugin => ({
  name: 'featurekit:js-to-ts-resolver',
  enforce: 'pre',
  resolveId(source, importer) {
    if (!importer || !source.startsWith('.') || !source.endsWith('.js')) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -'.js'.length)
    for (const candidate of [`${base}.ts`, `${base}.mts`]) {
      if (fs.existsSync(candidate)) {
        return candidate
      }
    }

    return null
  },
})
