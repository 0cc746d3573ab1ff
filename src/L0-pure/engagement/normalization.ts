import { clamp, maxOf, mean, minOf, percentile, standardDeviation } from '../statistics/statistics.js'
import type { NormalizationMethod, Timeline } from '../../types/index.js'

/** Value used for every sample when a timeline carries no contrast. */
export const NO_INFORMATION = 0.5

function constant(length: number): Timeline {
  return new Array<number>(length).fill(NO_INFORMATION)
}

function minmax(scores: readonly number[]): Timeline {
  const lo = minOf(scores)
  const hi = maxOf(scores)
  if (hi === lo) return constant(scores.length)
  return scores.map(v => (v - lo) / (hi - lo))
}

function zscore(scores: readonly number[]): Timeline {
  const avg = mean(scores)
  const std = standardDeviation(scores)
  if (std === 0) return constant(scores.length)
  return scores.map(v => 1 / (1 + Math.exp(-(v - avg) / std)))
}

function robust(scores: readonly number[]): Timeline {
  const q25 = percentile(scores, 25)
  const q75 = percentile(scores, 75)
  if (q75 === q25) return constant(scores.length)
  return scores.map(v => (v - q25) / (q75 - q25))
}

/**
 * Rescale a timeline into [0, 1].
 *
 * - `minmax` — linear rescale over the observed range
 * - `zscore` — standardize, then logistic squash
 * - `robust` — scale by the interquartile range, then clip (no squash)
 *
 * Unknown methods fall back to `minmax`. Degenerate input (all values equal)
 * maps to a constant 0.5.
 */
export function normalize(scores: readonly number[], method: NormalizationMethod | string = 'minmax'): Timeline {
  if (scores.length === 0) return []

  let normalized: Timeline
  switch (method) {
    case 'zscore':
      normalized = zscore(scores)
      break
    case 'robust':
      normalized = robust(scores)
      break
    default:
      normalized = minmax(scores)
  }

  return normalized.map(v => clamp(v, 0, 1))
}
