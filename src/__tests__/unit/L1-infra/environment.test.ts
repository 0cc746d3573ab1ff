import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { join } from 'path'
import { initConfig, getConfig } from '../../../L1-infra/config/environment.js'

const ENV_KEYS = [
  'OPENAI_API_KEY',
  'REPO_ROOT',
  'FFMPEG_PATH',
  'FFPROBE_PATH',
  'OUTPUT_DIR',
  'CACHE_DIR',
  'CACHE_ENABLED',
  'MAX_WORKERS',
  'ANALYSIS_INTERVAL',
  'ENGAGEMENT_CONFIG_PATH',
  'WHISPER_MODEL',
]

describe('environment config', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '')
    vi.stubEnv('REPO_ROOT', '/work')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('uses defaults when no env vars are set', () => {
    const cfg = initConfig()

    expect(cfg.OUTPUT_DIR).toBe(join('/work', 'analysis'))
    expect(cfg.CACHE_DIR).toBe(join('/work', 'temp', 'cache'))
    expect(cfg.ENGAGEMENT_CONFIG_PATH).toBe(join('/work', 'engagement.json'))
    expect(cfg.CACHE_ENABLED).toBe(true)
    expect(cfg.MAX_WORKERS).toBe(3)
    expect(cfg.ANALYSIS_INTERVAL).toBe(1)
    expect(cfg.WHISPER_MODEL).toBe('whisper-1')
    expect(cfg.FFMPEG_PATH).toBe('ffmpeg')
    expect(cfg.OPENAI_API_KEY).toBe('')
    expect(cfg.VERBOSE).toBe(false)
  })

  it('reads env vars', () => {
    vi.stubEnv('CACHE_DIR', '/var/cache/segments')
    vi.stubEnv('MAX_WORKERS', '5')
    vi.stubEnv('ANALYSIS_INTERVAL', '0.5')
    vi.stubEnv('CACHE_ENABLED', 'false')
    const cfg = initConfig()

    expect(cfg.CACHE_DIR).toBe('/var/cache/segments')
    expect(cfg.MAX_WORKERS).toBe(5)
    expect(cfg.ANALYSIS_INTERVAL).toBe(0.5)
    expect(cfg.CACHE_ENABLED).toBe(false)
  })

  it('ignores invalid numeric env vars', () => {
    vi.stubEnv('MAX_WORKERS', 'lots')
    vi.stubEnv('ANALYSIS_INTERVAL', '-2')
    const cfg = initConfig()

    expect(cfg.MAX_WORKERS).toBe(3)
    expect(cfg.ANALYSIS_INTERVAL).toBe(1)
  })

  it('lets CLI options override env vars', () => {
    vi.stubEnv('OPENAI_API_KEY', 'env-key')
    vi.stubEnv('CACHE_ENABLED', 'false')
    vi.stubEnv('MAX_WORKERS', '5')
    const cfg = initConfig({ openaiKey: 'cli-key', cache: true, workers: 1, outputDir: '/reports', verbose: true })

    expect(cfg.OPENAI_API_KEY).toBe('cli-key')
    expect(cfg.CACHE_ENABLED).toBe(true)
    expect(cfg.MAX_WORKERS).toBe(1)
    expect(cfg.OUTPUT_DIR).toBe('/reports')
    expect(cfg.VERBOSE).toBe(true)
  })

  it('getConfig returns the last initialized config', () => {
    initConfig({ cacheDir: '/tmp/segment-cache' })
    expect(getConfig().CACHE_DIR).toBe('/tmp/segment-cache')
  })
})
