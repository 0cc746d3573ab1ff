import {
  applyDistributionBonus,
  applySeparationPenalty,
  combine,
  generateCandidates,
  getBestSegments,
  scorePerModality,
} from '../../L0-pure/engagement/segments.js'
import { normalize } from '../../L0-pure/engagement/normalization.js'
import { summarizeSegments } from '../../L0-pure/engagement/summary.js'
import { maxOf, mean, minOf } from '../../L0-pure/statistics/statistics.js'
import { formatTimestamp } from '../../L0-pure/text/text.js'
import { writeJsonFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { DEFAULT_ENGAGEMENT_CONFIG } from '../../types/index.js'
import type { ModalityTimelines } from '../../L0-pure/engagement/segments.js'
import type {
  EngagementConfig,
  NormalizationMethod,
  SegmentCandidate,
  SegmentSummary,
  Timeline,
} from '../../types/index.js'

/** Shape of the exported engagement-analysis JSON. */
export interface EngagementExport {
  timestamp: string
  config: EngagementConfig
  segments: SegmentCandidate[]
  summary: {
    totalSegments: number
    averageScore: number
    scoreRange: { min: number; max: number }
    totalShortsDuration: number
    coveragePercentage: number
  }
}

/**
 * Combines modality timelines into ranked highlight segments.
 *
 * A thin, logging wrapper over the pure stages in `L0-pure/engagement`. The
 * config is copied on construction and never modified afterwards, so one
 * scorer can serve concurrent callers.
 */
export class EngagementScorer {
  readonly config: EngagementConfig

  constructor(config: EngagementConfig = DEFAULT_ENGAGEMENT_CONFIG) {
    this.config = { ...config, weights: { ...config.weights } }
  }

  normalize(scores: readonly number[], method: NormalizationMethod = this.config.normalizationMethod): Timeline {
    return normalize(scores, method)
  }

  combine(audio: readonly number[], visual: readonly number[], speech: readonly number[]): Timeline {
    const combined = combine(audio, visual, speech, this.config)
    if (combined.length === 0) {
      logger.warn('[EngagementScorer] One or more timelines are empty — nothing to combine')
    } else {
      logger.info(`[EngagementScorer] Combined ${combined.length} points (mean ${mean(combined).toFixed(3)}, max ${maxOf(combined).toFixed(3)})`)
    }
    return combined
  }

  generateCandidates(combined: readonly number[], intervalSeconds: number = 1): SegmentCandidate[] {
    const candidates = generateCandidates(combined, intervalSeconds, this.config)
    logger.info(`[EngagementScorer] Generated ${candidates.length} candidate segments`)
    return candidates
  }

  scorePerModality(
    candidates: readonly SegmentCandidate[],
    timelines: ModalityTimelines,
    intervalSeconds: number = 1,
  ): SegmentCandidate[] {
    return scorePerModality(candidates, timelines, intervalSeconds)
  }

  applySeparationPenalty(candidates: readonly SegmentCandidate[]): SegmentCandidate[] {
    return applySeparationPenalty(candidates, this.config)
  }

  applyDistributionBonus(candidates: readonly SegmentCandidate[], totalDurationSeconds: number): SegmentCandidate[] {
    return applyDistributionBonus(candidates, totalDurationSeconds, this.config)
  }

  /**
   * Pick the `count` best `durationSeconds`-long segments. The result is in
   * chronological order; `rank` gives the quality order. An empty array means
   * no segment could be produced.
   */
  getBestSegments(
    audio: readonly number[],
    visual: readonly number[],
    speech: readonly number[],
    durationSeconds: number,
    count: number,
    totalDurationSeconds?: number,
    intervalSeconds: number = 1,
  ): SegmentCandidate[] {
    logger.info(`[EngagementScorer] Selecting the ${count} best ${durationSeconds}s segments`)

    const segments = getBestSegments(
      { audio, visual, speech },
      { durationSeconds, count, totalDurationSeconds, intervalSeconds },
      this.config,
    )

    if (segments.length === 0) {
      logger.warn('[EngagementScorer] No segments could be selected')
      return segments
    }
    logger.info(`[EngagementScorer] Selected ${segments.length} segments`)
    for (const segment of segments) {
      logger.info(
        `[EngagementScorer] Rank ${segment.rank}: ${formatTimestamp(segment.startTime)}–${formatTimestamp(segment.endTime)} ` +
        `(score ${segment.combinedScore.toFixed(3)})`,
      )
    }
    return segments
  }

  getAnalysisSummary(segments: readonly SegmentCandidate[]): SegmentSummary | null {
    return summarizeSegments(segments, this.config)
  }

  /** Build the debug export written next to the analysis output. */
  buildExport(segments: readonly SegmentCandidate[]): EngagementExport {
    const scores = segments.map(s => s.combinedScore)
    const totalShortsDuration = segments.reduce((sum, s) => sum + s.duration, 0)
    const lastEnd = segments.length > 0 ? maxOf(segments.map(s => s.endTime)) : 0

    return {
      timestamp: new Date().toISOString(),
      config: this.config,
      segments: [...segments],
      summary: {
        totalSegments: segments.length,
        averageScore: mean(scores),
        scoreRange: { min: minOf(scores), max: maxOf(scores) },
        totalShortsDuration,
        coveragePercentage: lastEnd > 0 ? (totalShortsDuration / lastEnd) * 100 : 0,
      },
    }
  }

  /** Write the selected segments and the config used. Failures are logged, not thrown. */
  async exportAnalysisResults(segments: readonly SegmentCandidate[], outputPath: string): Promise<boolean> {
    try {
      await writeJsonFile(outputPath, this.buildExport(segments))
      logger.info(`[EngagementScorer] Analysis exported: ${outputPath}`)
      return true
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error(`[EngagementScorer] Failed to export analysis to ${outputPath}: ${message}`)
      return false
    }
  }
}
