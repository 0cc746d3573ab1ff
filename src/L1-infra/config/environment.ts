import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from '../env/env.js'

// Load .env file from repo root
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export interface AppEnvironment {
  OPENAI_API_KEY: string
  REPO_ROOT: string
  FFMPEG_PATH: string
  FFPROBE_PATH: string
  OUTPUT_DIR: string
  CACHE_DIR: string
  CACHE_ENABLED: boolean
  MAX_WORKERS: number
  ANALYSIS_INTERVAL: number
  ENGAGEMENT_CONFIG_PATH: string
  WHISPER_MODEL: string
  VERBOSE: boolean
}

export interface CLIOptions {
  outputDir?: string
  cacheDir?: string
  cache?: boolean
  workers?: number
  interval?: number
  config?: string
  openaiKey?: string
  verbose?: boolean
}

let config: AppEnvironment | null = null

/** Parse a positive number from an env var, falling back when unset or invalid. */
function positiveNumber(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback
  const parsed = Number(raw)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  const repoRoot = process.env.REPO_ROOT || process.cwd()

  config = {
    OPENAI_API_KEY: cli.openaiKey || process.env.OPENAI_API_KEY || '',
    REPO_ROOT: repoRoot,
    FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',
    FFPROBE_PATH: process.env.FFPROBE_PATH || 'ffprobe',
    OUTPUT_DIR: cli.outputDir || process.env.OUTPUT_DIR || join(repoRoot, 'analysis'),
    CACHE_DIR: cli.cacheDir || process.env.CACHE_DIR || join(repoRoot, 'temp', 'cache'),
    CACHE_ENABLED: cli.cache ?? process.env.CACHE_ENABLED !== 'false',
    MAX_WORKERS: cli.workers ?? positiveNumber(process.env.MAX_WORKERS, 3),
    ANALYSIS_INTERVAL: cli.interval ?? positiveNumber(process.env.ANALYSIS_INTERVAL, 1),
    ENGAGEMENT_CONFIG_PATH: cli.config || process.env.ENGAGEMENT_CONFIG_PATH || join(repoRoot, 'engagement.json'),
    WHISPER_MODEL: process.env.WHISPER_MODEL || 'whisper-1',
    VERBOSE: cli.verbose ?? false,
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
