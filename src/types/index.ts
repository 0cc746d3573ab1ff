/**
 * Type definitions for the segmentscout engagement pipeline.
 *
 * Domain types covering per-modality analysis timelines, the on-disk analysis
 * cache, progress reporting, and ranked segment candidates.
 *
 * ### Timestamp convention
 * All `startTime` and `endTime` fields are in **seconds from the beginning of
 * the video** (floating-point). A timeline index `i` covers the interval
 * `[i * intervalSeconds, (i + 1) * intervalSeconds)`.
 */

// ============================================================================
// MODALITIES
// ============================================================================

/** Independent signal sources analyzed for every video. */
export type Modality = 'audio' | 'visual' | 'speech'

export const MODALITIES: readonly Modality[] = ['audio', 'visual', 'speech']

/**
 * Ordered, fixed-interval sequence of non-negative scores for one modality.
 * Lengths may differ slightly between modalities of the same video.
 */
export type Timeline = number[]

/** Free-form statistics an analyzer reports next to its timeline. */
export type AnalysisSummary = Record<string, unknown>

/** Output of one modality analysis — what gets cached per fingerprint. */
export interface ModalityAnalysis {
  timeline: Timeline
  summary: AnalysisSummary
}

// ============================================================================
// CACHE
// ============================================================================

/**
 * A cached modality analysis.
 *
 * Entries are immutable once written; a later write for the same fingerprint
 * replaces the file wholesale.
 */
export interface AnalysisCacheEntry {
  fingerprint: string
  /** ISO-8601 time of the write */
  timestamp: string
  data: ModalityAnalysis
}

// ============================================================================
// PROGRESS
// ============================================================================

/** `percent` is in [0, 100]; `-1` marks a failed modality. */
export interface ProgressEvent {
  modality: Modality
  percent: number
  statusMessage: string
  /** ISO-8601 */
  timestamp: string
}

/** Observer invoked synchronously for every progress event. Must not block. */
export type ProgressCallback = (modality: Modality, percent: number, status: string) => void

export type ProgressSnapshot = Readonly<Partial<Record<Modality, ProgressEvent>>>

// ============================================================================
// ORCHESTRATION
// ============================================================================

export interface OrchestratorOptions {
  cacheEnabled: boolean
  cacheDir: string
  /** Width of the worker pool; 3 runs every modality at once. */
  maxWorkers: number
  /** Seconds per timeline sample. */
  intervalSeconds: number
  onProgress?: ProgressCallback
}

/** Option snapshot recorded in result metadata (functions dropped). */
export type OrchestratorConfigSnapshot = Omit<OrchestratorOptions, 'onProgress'>

export interface AnalysisMetadata {
  sourcePath: string
  wallClockSeconds: number
  /** ISO-8601 */
  timestamp: string
  config: OrchestratorConfigSnapshot
}

/** Aggregate of all modality analyses for one video. Failed modalities are empty. */
export interface AnalysisResults {
  audio: ModalityAnalysis
  visual: ModalityAnalysis
  speech: ModalityAnalysis
  metadata: AnalysisMetadata
}

// ============================================================================
// ENGAGEMENT SCORING
// ============================================================================

export type NormalizationMethod = 'minmax' | 'zscore' | 'robust'

export const NORMALIZATION_METHODS: readonly NormalizationMethod[] = ['minmax', 'zscore', 'robust']

export interface ModalityWeights {
  audio: number
  visual: number
  speech: number
}

export interface EngagementConfig {
  weights: ModalityWeights
  segmentDurationSeconds: number
  minSeparationSeconds: number
  /** Multiplier applied to candidates that sit too close to a better one. */
  overlapPenaltyFactor: number
  /** Total bonus shared by the candidates of one time bucket. */
  distributionBonus: number
  normalizationMethod: NormalizationMethod
}

export const DEFAULT_ENGAGEMENT_CONFIG: EngagementConfig = {
  weights: { audio: 0.4, visual: 0.3, speech: 0.3 },
  segmentDurationSeconds: 60,
  minSeparationSeconds: 30,
  overlapPenaltyFactor: 0.5,
  distributionBonus: 0.1,
  normalizationMethod: 'minmax',
}

/**
 * A fixed-width sub-clip proposal.
 *
 * Candidates are values: each scoring stage returns new objects rather than
 * mutating the previous stage's output. `rank` stays 0 until selection.
 */
export interface SegmentCandidate {
  readonly startTime: number
  readonly endTime: number
  readonly duration: number
  readonly audioScore: number
  readonly visualScore: number
  readonly speechScore: number
  readonly combinedScore: number
  readonly rank: number
}

export interface ScoreStatistics {
  mean: number
  max: number
  min: number
  std: number
}

/** Descriptive statistics over a set of selected segments. */
export interface SegmentSummary {
  segmentsCount: number
  totalDuration: number
  scoreStatistics: {
    audio: ScoreStatistics
    visual: ScoreStatistics
    speech: ScoreStatistics
    combined: ScoreStatistics
  }
  configUsed: EngagementConfig
  bestSegment: SegmentCandidate
  timeDistribution: {
    firstSegment: number
    lastSegment: number
    averageSeparation: number
  }
}

// ============================================================================
// PIPELINE
// ============================================================================

export interface CompleteAnalysis {
  sourcePath: string
  analysisResults: AnalysisResults
  bestSegments: SegmentCandidate[]
  summary: {
    totalAnalysisTime: number
    segmentsFound: number
    shortsDuration: number
    shortsCount: number
  }
}
