import { createHash, randomBytes } from 'crypto'
import {
  ensureDirectorySync,
  fileExists,
  getFileStats,
  listDirectory,
  readJsonFile,
  removeFile,
  renameFile,
  writeJsonFile,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AnalysisCacheEntry, Modality, ModalityAnalysis } from '../../types/index.js'

const ENTRY_SUFFIX = '.json'

export interface CacheStats {
  entries: number
  totalBytes: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isTimeline(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number')
}

/** Validate the persisted `{ timestamp, data: { timeline, summary } }` shape. */
function toCachedAnalysis(raw: unknown): { timestamp: string; data: ModalityAnalysis } | undefined {
  if (!isRecord(raw) || typeof raw.timestamp !== 'string' || !isRecord(raw.data)) return undefined
  const { timeline, summary } = raw.data
  if (!isTimeline(timeline) || !isRecord(summary)) return undefined
  return { timestamp: raw.timestamp, data: { timeline, summary } }
}

/**
 * Content-addressed store of modality analyses, one JSON file per fingerprint.
 *
 * Every read and write is best-effort: failures are logged and surface as a
 * miss (reads) or a no-op (writes). Only construction throws, when the cache
 * directory cannot be created.
 */
export class AnalysisCache {
  constructor(
    readonly cacheDir: string,
    readonly enabled: boolean = true,
  ) {
    if (enabled) {
      ensureDirectorySync(cacheDir)
    }
  }

  /**
   * Cache key for one modality of one source file, derived from its path,
   * modification time and size. `undefined` when the source cannot be
   * stat'ed (a URL, a missing file): such results are never cached.
   */
  async fingerprint(sourcePath: string, modality: Modality): Promise<string | undefined> {
    try {
      const stats = await getFileStats(sourcePath)
      const content = `${sourcePath}_${modality}_${stats.mtimeMs}_${stats.size}`
      return createHash('md5').update(content).digest('hex')
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.warn(`[AnalysisCache] Cannot fingerprint ${sourcePath} (${message}) — result will not be cached`)
      return undefined
    }
  }

  private entryPath(fingerprint: string): string {
    return join(this.cacheDir, `${fingerprint}${ENTRY_SUFFIX}`)
  }

  async get(fingerprint: string): Promise<AnalysisCacheEntry | undefined> {
    if (!this.enabled) return undefined

    const filePath = this.entryPath(fingerprint)
    if (!(await fileExists(filePath))) return undefined

    try {
      const cached = toCachedAnalysis(await readJsonFile(filePath))
      if (!cached) {
        logger.warn(`[AnalysisCache] Ignoring malformed entry: ${fingerprint}`)
        return undefined
      }
      logger.debug(`[AnalysisCache] Hit: ${fingerprint}`)
      return { fingerprint, ...cached }
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.warn(`[AnalysisCache] Failed to read ${fingerprint}: ${message}`)
      return undefined
    }
  }

  /**
   * Persist an analysis. The file is written under a temporary name and
   * renamed into place, so concurrent readers see either the old or the new
   * entry. Concurrent writers are not coordinated; the last rename wins.
   */
  async put(fingerprint: string, data: ModalityAnalysis): Promise<void> {
    if (!this.enabled) return

    const filePath = this.entryPath(fingerprint)
    const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
    try {
      await writeJsonFile(tempPath, { timestamp: new Date().toISOString(), data })
      await renameFile(tempPath, filePath)
      logger.debug(`[AnalysisCache] Saved: ${fingerprint}`)
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.warn(`[AnalysisCache] Failed to save ${fingerprint}: ${message}`)
      await removeFile(tempPath).catch((cleanupErr: unknown) => {
        logger.debug(`[AnalysisCache] Could not remove ${tempPath}: ${String(cleanupErr)}`)
      })
    }
  }

  private async entryFiles(): Promise<string[]> {
    if (!(await fileExists(this.cacheDir))) return []
    const names = await listDirectory(this.cacheDir)
    return names.filter(name => name.endsWith(ENTRY_SUFFIX))
  }

  /** Delete every cached entry. Returns how many were removed. */
  async clear(): Promise<number> {
    try {
      const files = await this.entryFiles()
      for (const name of files) {
        await removeFile(join(this.cacheDir, name))
      }
      logger.info(`[AnalysisCache] Cleared ${files.length} entries from ${this.cacheDir}`)
      return files.length
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error(`[AnalysisCache] Failed to clear cache: ${message}`)
      return 0
    }
  }

  async stats(): Promise<CacheStats> {
    const files = await this.entryFiles()
    let totalBytes = 0
    for (const name of files) {
      const stats = await getFileStats(join(this.cacheDir, name))
      totalBytes += stats.size
    }
    return { entries: files.length, totalBytes }
  }
}
