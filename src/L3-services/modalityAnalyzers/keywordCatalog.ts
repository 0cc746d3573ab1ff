import { readJsonFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { assetPath } from '../../L1-infra/paths/paths.js'
import type { KeywordCatalog, KeywordCategory } from '../../L0-pure/signals/signals.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toCategory(name: string, raw: unknown): KeywordCategory {
  if (!isRecord(raw) || typeof raw.weight !== 'number' || !Array.isArray(raw.words)) {
    throw new Error(`keywords.json: category "${name}" needs a numeric "weight" and a "words" array`)
  }
  return { weight: raw.weight, words: raw.words.filter((w): w is string => typeof w === 'string') }
}

/** Validate the `{ categories: { name: { weight, words } } }` document. */
export function parseKeywordCatalog(raw: unknown): KeywordCatalog {
  if (!isRecord(raw) || !isRecord(raw.categories)) {
    throw new Error('keywords.json: expected a "categories" object')
  }
  const catalog: KeywordCatalog = {}
  for (const [name, category] of Object.entries(raw.categories)) {
    catalog[name] = toCategory(name, category)
  }
  return catalog
}

let cached: KeywordCatalog | null = null

/** Load the bundled keyword catalog (read once per process). */
export async function loadKeywordCatalog(filePath: string = assetPath('keywords.json')): Promise<KeywordCatalog> {
  if (cached) return cached
  cached = parseKeywordCatalog(await readJsonFile(filePath))
  return cached
}
