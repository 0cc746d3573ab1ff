import { mean } from '../statistics/statistics.js'
import { normalize } from './normalization.js'
import type { EngagementConfig, SegmentCandidate, Timeline } from '../../types/index.js'

/** Number of equal-width time buckets used by the distribution bonus. */
export const DISTRIBUTION_BUCKETS = 5

export interface ModalityTimelines {
  audio: readonly number[]
  visual: readonly number[]
  speech: readonly number[]
}

export interface BestSegmentsRequest {
  /** Segment length for this call; overrides `config.segmentDurationSeconds`. */
  durationSeconds: number
  count: number
  /** Length of the source video. The distribution bonus is skipped when unknown. */
  totalDurationSeconds?: number
  /** Seconds per timeline sample (default 1). */
  intervalSeconds?: number
}

// ── Timeline combination ─────────────────────────────────────────────────────

/**
 * Truncate the three timelines to the shortest, normalize each with
 * `config.normalizationMethod`, and return their weighted sum.
 * Returns `[]` when any input is empty — no segments can be selected then.
 */
export function combine(
  audio: readonly number[],
  visual: readonly number[],
  speech: readonly number[],
  config: EngagementConfig,
): Timeline {
  const minLength = Math.min(audio.length, visual.length, speech.length)
  if (minLength === 0) return []

  const audioNorm = normalize(audio.slice(0, minLength), config.normalizationMethod)
  const visualNorm = normalize(visual.slice(0, minLength), config.normalizationMethod)
  const speechNorm = normalize(speech.slice(0, minLength), config.normalizationMethod)
  const { weights } = config

  const combined: Timeline = []
  for (let i = 0; i < minLength; i++) {
    combined.push(
      audioNorm[i] * weights.audio +
      visualNorm[i] * weights.visual +
      speechNorm[i] * weights.speech,
    )
  }
  return combined
}

// ── Candidate generation ─────────────────────────────────────────────────────

/** Window length in samples for a segment duration. */
export function windowSamples(segmentDurationSeconds: number, intervalSeconds: number): number {
  return Math.round(segmentDurationSeconds / intervalSeconds)
}

/**
 * Slide a fixed window (50% overlap) across the combined timeline. Each
 * candidate's `combinedScore` is the mean of its window. Partial windows at
 * the tail are never produced.
 */
export function generateCandidates(
  combined: readonly number[],
  intervalSeconds: number,
  config: EngagementConfig,
): SegmentCandidate[] {
  const window = windowSamples(config.segmentDurationSeconds, intervalSeconds)
  if (window <= 0) return []
  const stride = Math.max(1, Math.floor(window / 2))

  const candidates: SegmentCandidate[] = []
  for (let start = 0; start + window <= combined.length; start += stride) {
    const end = start + window
    candidates.push({
      startTime: start * intervalSeconds,
      endTime: end * intervalSeconds,
      duration: window * intervalSeconds,
      audioScore: 0,
      visualScore: 0,
      speechScore: 0,
      combinedScore: mean(combined.slice(start, end)),
      rank: 0,
    })
  }
  return candidates
}

// ── Per-modality scores ──────────────────────────────────────────────────────

function rangeMean(raw: readonly number[], startIdx: number, endIdx: number): number {
  if (startIdx >= raw.length) return 0
  const slice = raw.slice(startIdx, endIdx)
  return slice.length === 0 ? 0 : mean(slice)
}

/**
 * Fill `audioScore` / `visualScore` / `speechScore` with the mean of each
 * *raw* (un-normalized) timeline over the candidate's index range. A
 * timeline that ends before the candidate starts scores 0.
 */
export function scorePerModality(
  candidates: readonly SegmentCandidate[],
  timelines: ModalityTimelines,
  intervalSeconds: number,
): SegmentCandidate[] {
  return candidates.map(candidate => {
    // Candidate times are exact multiples of the interval; round away float drift
    const startIdx = Math.round(candidate.startTime / intervalSeconds)
    const endIdx = Math.round(candidate.endTime / intervalSeconds)
    return {
      ...candidate,
      audioScore: rangeMean(timelines.audio, startIdx, endIdx),
      visualScore: rangeMean(timelines.visual, startIdx, endIdx),
      speechScore: rangeMean(timelines.speech, startIdx, endIdx),
    }
  })
}

// ── Separation penalty ───────────────────────────────────────────────────────

/** Gap between two segments as the nearer of the two end-to-start distances. */
export function segmentDistance(a: SegmentCandidate, b: SegmentCandidate): number {
  return Math.min(
    Math.abs(a.startTime - b.endTime),
    Math.abs(b.startTime - a.endTime),
  )
}

/**
 * Walk candidates best-first, accepting each one that keeps at least
 * `minSeparationSeconds` from every accepted candidate. Rejected candidates
 * are demoted by `overlapPenaltyFactor` but stay in the returned list,
 * which is sorted by descending pre-penalty score.
 */
export function applySeparationPenalty(
  candidates: readonly SegmentCandidate[],
  config: EngagementConfig,
): SegmentCandidate[] {
  const sorted = [...candidates].sort((a, b) => b.combinedScore - a.combinedScore)
  const accepted: SegmentCandidate[] = []

  return sorted.map(candidate => {
    const tooClose = accepted.some(
      other => segmentDistance(candidate, other) < config.minSeparationSeconds,
    )
    if (tooClose) {
      return { ...candidate, combinedScore: candidate.combinedScore * config.overlapPenaltyFactor }
    }
    accepted.push(candidate)
    return candidate
  })
}

// ── Distribution bonus ───────────────────────────────────────────────────────

function bucketOf(startTime: number, bucketWidth: number): number {
  return Math.min(Math.floor(startTime / bucketWidth), DISTRIBUTION_BUCKETS - 1)
}

/**
 * Split `[0, totalDurationSeconds)` into equal buckets by `startTime` and add
 * `distributionBonus / (candidates in the same bucket)` to each candidate.
 * Sparse regions of the video gain more than crowded ones.
 */
export function applyDistributionBonus(
  candidates: readonly SegmentCandidate[],
  totalDurationSeconds: number,
  config: EngagementConfig,
): SegmentCandidate[] {
  if (!(totalDurationSeconds > 0)) return [...candidates]

  const bucketWidth = totalDurationSeconds / DISTRIBUTION_BUCKETS
  const buckets = candidates.map(c => bucketOf(c.startTime, bucketWidth))
  const population = new Map<number, number>()
  for (const bucket of buckets) {
    population.set(bucket, (population.get(bucket) ?? 0) + 1)
  }

  return candidates.map((candidate, i) => {
    const inBucket = population.get(buckets[i]) ?? 1
    return { ...candidate, combinedScore: candidate.combinedScore + config.distributionBonus / inBucket }
  })
}

// ── Selection ────────────────────────────────────────────────────────────────

/**
 * Take the `count` best candidates, rank them 1..n by score, then return
 * them in chronological order. Ranks are therefore not monotonic with the
 * returned order.
 */
export function selectTopSegments(
  candidates: readonly SegmentCandidate[],
  count: number,
): SegmentCandidate[] {
  if (count <= 0) return []
  return [...candidates]
    .sort((a, b) => b.combinedScore - a.combinedScore)
    .slice(0, count)
    .map((candidate, i) => ({ ...candidate, rank: i + 1 }))
    .sort((a, b) => a.startTime - b.startTime)
}

/**
 * Full selection pipeline. Stages run strictly in order, each consuming the
 * previous stage's candidates:
 *
 * combine → generate → per-modality scores → separation penalty →
 * distribution bonus (when the total duration is known) → select/rank.
 *
 * Returns `[]` when the combined timeline is empty.
 */
export function getBestSegments(
  timelines: ModalityTimelines,
  request: BestSegmentsRequest,
  baseConfig: EngagementConfig,
): SegmentCandidate[] {
  const config: EngagementConfig = { ...baseConfig, segmentDurationSeconds: request.durationSeconds }
  const intervalSeconds = request.intervalSeconds ?? 1

  const combined = combine(timelines.audio, timelines.visual, timelines.speech, config)
  if (combined.length === 0) return []

  const generated = generateCandidates(combined, intervalSeconds, config)
  const scored = scorePerModality(generated, timelines, intervalSeconds)
  const separated = applySeparationPenalty(scored, config)
  const distributed = request.totalDurationSeconds !== undefined
    ? applyDistributionBonus(separated, request.totalDurationSeconds, config)
    : separated

  return selectTopSegments(distributed, request.count)
}
