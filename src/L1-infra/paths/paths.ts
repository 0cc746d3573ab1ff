// Re-export all commonly used path functions
export { join, resolve, dirname, basename, extname, parse, sep, relative, normalize } from 'path'
export { fileURLToPath } from 'url'

import { existsSync } from 'fs'
import { join, resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Walk up from `startDir` until a directory containing `package.json` is found.
 * Throws if the filesystem root is reached without finding one.
 */
export function findRoot(startDir: string): string {
  let dir = resolve(startDir)
  while (true) {
    if (existsSync(join(dir, 'package.json'))) return dir
    const parent = dirname(dir)
    if (parent === dir) throw new Error(`Could not find project root from ${startDir}`)
    dir = parent
  }
}

let _cachedRoot: string | undefined

/** Get the project root directory. */
export function projectRoot(): string {
  if (!_cachedRoot) _cachedRoot = findRoot(__dirname)
  return _cachedRoot
}

/**
 * Resolve a file under the assets directory — checks bundled (dist/assets/) first,
 * falls back to dev (assets/).
 */
export function assetPath(...segments: string[]): string {
  const bundled = resolve(projectRoot(), 'dist', 'assets', ...segments)
  return existsSync(bundled) ? bundled : join(projectRoot(), 'assets', ...segments)
}
