import { maxOf, mean, minOf, standardDeviation } from '../statistics/statistics.js'
import type { EngagementConfig, ScoreStatistics, SegmentCandidate, SegmentSummary } from '../../types/index.js'

function statistics(values: readonly number[]): ScoreStatistics {
  return {
    mean: mean(values),
    max: maxOf(values),
    min: minOf(values),
    std: standardDeviation(values),
  }
}

/** Lower rank wins; unranked (0) segments lose to ranked ones and fall back to score. */
function outranks(a: SegmentCandidate, b: SegmentCandidate): boolean {
  if (a.rank !== b.rank) return a.rank > 0 && (b.rank === 0 || a.rank < b.rank)
  return a.combinedScore > b.combinedScore
}

/**
 * Describe a set of selected segments (expected in chronological order).
 * Returns `null` for an empty selection.
 */
export function summarizeSegments(
  segments: readonly SegmentCandidate[],
  config: EngagementConfig,
): SegmentSummary | null {
  if (segments.length === 0) return null

  const gaps: number[] = []
  for (let i = 0; i < segments.length - 1; i++) {
    gaps.push(segments[i + 1].startTime - segments[i].endTime)
  }

  return {
    segmentsCount: segments.length,
    totalDuration: segments.reduce((sum, s) => sum + s.duration, 0),
    scoreStatistics: {
      audio: statistics(segments.map(s => s.audioScore)),
      visual: statistics(segments.map(s => s.visualScore)),
      speech: statistics(segments.map(s => s.speechScore)),
      combined: statistics(segments.map(s => s.combinedScore)),
    },
    configUsed: config,
    bestSegment: segments.reduce((best, s) => (outranks(s, best) ? s : best)),
    timeDistribution: {
      firstSegment: segments[0].startTime,
      lastSegment: segments[segments.length - 1].startTime,
      averageSeparation: mean(gaps),
    },
  }
}
