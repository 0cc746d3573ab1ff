import {
  promises as fsp,
  existsSync,
  statSync,
  readFileSync,
  mkdirSync,
  createReadStream,
} from 'fs'
import type { Stats, ReadStream } from 'fs'
import tmp from 'tmp'
import { dirname } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats, ReadStream }

/** Narrow an unknown error to a Node errno exception. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}

function isNotFound(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT'
}

// ── Reads ──────────────────────────────────────────────────────

/**
 * Read and parse a JSON file. Throws descriptive error on ENOENT or parse failure.
 * The result is untyped — callers validate the shape they expect.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
  try {
    return JSON.parse(raw)
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Failed to parse JSON at ${filePath}: ${message}`)
  }
}

/** Read a text file as UTF-8 string. Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** List directory contents. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Sync variant. */
export function getFileStatsSync(filePath: string): Stats {
  try {
    return statSync(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Create a read stream. */
export function openReadStream(filePath: string): ReadStream {
  return createReadStream(filePath)
}

// ── Writes ─────────────────────────────────────────────────────

/** Write data as JSON. Creates parent dirs. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 })
}

/** Write a text file. Creates parent dirs. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content.replace(/\0/g, ''), { encoding: 'utf-8', mode: 0o600 })
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Sync variant. */
export function ensureDirectorySync(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true })
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

/** Remove directory. */
export async function removeDirectory(
  dirPath: string,
  opts?: { recursive?: boolean; force?: boolean },
): Promise<void> {
  try {
    await fsp.rm(dirPath, { recursive: opts?.recursive ?? false, force: opts?.force ?? false })
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

/** Rename a file in place (fs.rename). Atomic within one file system. */
export async function renameFile(oldPath: string, newPath: string): Promise<void> {
  await fsp.rename(oldPath, newPath)
}

// ── Temp Dir ───────────────────────────────────────────────────

/** Create a temporary directory with the given prefix. Caller is responsible for cleanup. */
export async function makeTempDir(prefix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    // mode 0o700 ensures only the owner can access the directory
    tmp.dir({ prefix, mode: 0o700 }, (err, path) => {
      if (err) reject(err)
      else resolve(path)
    })
  })
}
