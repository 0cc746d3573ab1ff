import { createRequire } from 'module'

/** CommonJS `require` scoped to an ES module — used for optional binary-installer packages. */
export function createModuleRequire(metaUrl: string): NodeJS.Require {
  return createRequire(metaUrl)
}
