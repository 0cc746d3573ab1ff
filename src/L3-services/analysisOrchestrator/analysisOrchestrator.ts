import { AnalysisCache } from '../analysisCache/analysisCache.js'
import { defaultAnalyzers } from '../modalityAnalyzers/index.js'
import { ProgressTracker } from './progressTracker.js'
import { runSettled } from '../../L0-pure/concurrency/runSettled.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { MODALITIES } from '../../types/index.js'
import type { AnalyzerFactories, ModalityAnalyzer } from '../modalityAnalyzers/index.js'
import type {
  AnalysisResults,
  Modality,
  ModalityAnalysis,
  OrchestratorConfigSnapshot,
  OrchestratorOptions,
  ProgressSnapshot,
} from '../../types/index.js'

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Options from the environment config, overridden by `overrides`. */
export function resolveOrchestratorOptions(overrides: Partial<OrchestratorOptions> = {}): OrchestratorOptions {
  const config = getConfig()
  return {
    cacheEnabled: config.CACHE_ENABLED,
    cacheDir: config.CACHE_DIR,
    maxWorkers: config.MAX_WORKERS,
    intervalSeconds: config.ANALYSIS_INTERVAL,
    ...overrides,
  }
}

/**
 * Runs the audio, visual and speech analyses for a video.
 *
 * Each modality consults the cache first and falls back to its analyzer.
 * Modalities run concurrently in a bounded pool; a failing modality is
 * recorded as an empty result and never aborts its siblings. Progress is
 * tracked per instance, so two orchestrators never share state.
 *
 * The constructor throws when the cache directory cannot be created.
 */
export class AnalysisOrchestrator {
  readonly options: OrchestratorOptions
  private readonly cache: AnalysisCache
  private readonly progress: ProgressTracker

  constructor(
    options: Partial<OrchestratorOptions> = {},
    private readonly analyzers: AnalyzerFactories = defaultAnalyzers,
  ) {
    this.options = resolveOrchestratorOptions(options)
    this.cache = new AnalysisCache(this.options.cacheDir, this.options.cacheEnabled)
    this.progress = new ProgressTracker(this.options.onProgress)
    logger.info(`[Orchestrator] Ready (cache=${this.options.cacheEnabled ? this.options.cacheDir : 'off'}, workers=${this.options.maxWorkers})`)
  }

  /**
   * Analyze one modality, served from the cache when possible. Analyzer
   * failures are reported as progress `-1` and rethrown.
   */
  async analyzeModality(sourcePath: string, modality: Modality): Promise<ModalityAnalysis> {
    this.progress.update(modality, 0, `Starting ${modality} analysis`)

    const fingerprint = await this.cache.fingerprint(sourcePath, modality)
    const cached = fingerprint === undefined ? undefined : await this.cache.get(fingerprint)
    if (cached) {
      logger.info(`[Orchestrator] ${modality} analysis loaded from cache`)
      this.progress.update(modality, 100, 'Loaded from cache')
      return cached.data
    }

    let analyzer: ModalityAnalyzer | undefined
    try {
      analyzer = this.analyzers[modality](this.options.intervalSeconds)
      const result = await analyzer.produceTimeline(sourcePath, (percent, status) => {
        this.progress.update(modality, percent, status)
      })
      if (fingerprint !== undefined) {
        await this.cache.put(fingerprint, result)
      }
      this.progress.update(modality, 100, `${modality} analysis complete`)
      logger.info(`[Orchestrator] ${modality} analysis complete (${result.timeline.length} samples)`)
      return result
    } catch (err: unknown) {
      const message = errorMessage(err)
      this.progress.update(modality, -1, `Error: ${message}`)
      logger.error(`[Orchestrator] ${modality} analysis failed: ${message}`)
      throw err
    } finally {
      await analyzer?.cleanup().catch((cleanupErr: unknown) => {
        logger.warn(`[Orchestrator] ${modality} analyzer cleanup failed: ${errorMessage(cleanupErr)}`)
      })
    }
  }

  /**
   * Run every modality and join. Never rejects because of a single
   * modality: failures become `{ timeline: [], summary: {} }`.
   */
  async analyzeAll(sourcePath: string): Promise<AnalysisResults> {
    logger.info(`[Orchestrator] Starting parallel analysis: ${sourcePath}`)
    const startedAt = Date.now()

    const settled = await runSettled(
      MODALITIES.map(modality => () => this.analyzeModality(sourcePath, modality)),
      this.options.maxWorkers,
    )

    const completed = new Map<Modality, ModalityAnalysis>()
    MODALITIES.forEach((modality, i) => {
      const outcome = settled[i]
      if (outcome.status === 'fulfilled') {
        completed.set(modality, outcome.value)
        logger.info(`[Orchestrator] ✓ ${modality}`)
      } else {
        logger.error(`[Orchestrator] ✗ ${modality}: ${errorMessage(outcome.reason)}`)
      }
    })
    const resultOf = (modality: Modality): ModalityAnalysis =>
      completed.get(modality) ?? { timeline: [], summary: {} }

    const wallClockSeconds = (Date.now() - startedAt) / 1000
    logger.info(`[Orchestrator] Parallel analysis finished in ${wallClockSeconds.toFixed(1)}s`)

    return {
      audio: resultOf('audio'),
      visual: resultOf('visual'),
      speech: resultOf('speech'),
      metadata: {
        sourcePath,
        wallClockSeconds,
        timestamp: new Date().toISOString(),
        config: this.configSnapshot(),
      },
    }
  }

  getCurrentProgress(): ProgressSnapshot {
    return this.progress.snapshot()
  }

  /** Remove every cached analysis. Returns the number of entries removed. */
  async clearCache(): Promise<number> {
    return this.cache.clear()
  }

  /** Forget all progress state. */
  cleanup(): void {
    this.progress.reset()
    logger.debug('[Orchestrator] Progress state cleared')
  }

  private configSnapshot(): OrchestratorConfigSnapshot {
    const { onProgress: _callback, ...serializable } = this.options
    return serializable
  }
}
