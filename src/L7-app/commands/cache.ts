import { AnalysisCache } from '../../L3-services/analysisCache/analysisCache.js'
import { getConfig } from '../../L1-infra/config/environment.js'

function openCache(): AnalysisCache {
  return new AnalysisCache(getConfig().CACHE_DIR)
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export async function runCacheClear(): Promise<void> {
  const cache = openCache()
  const removed = await cache.clear()
  console.log(`Removed ${removed} cached analyses from ${cache.cacheDir}`)
}

export async function runCacheStats(): Promise<void> {
  const cache = openCache()
  const { entries, totalBytes } = await cache.stats()
  console.log(`Cache directory: ${cache.cacheDir}`)
  console.log(`Entries:         ${entries}`)
  console.log(`Size:            ${formatBytes(totalBytes)}`)
}
