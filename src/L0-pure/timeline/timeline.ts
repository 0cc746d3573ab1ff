import { maxOf, mean } from '../statistics/statistics.js'
import type { Timeline } from '../../types/index.js'

/** A value observed at a point in time (seconds). */
export interface TimedSample {
  time: number
  value: number
}

/**
 * Group samples into fixed-width intervals. Index `i` holds the values with
 * `time` in `[i·interval, (i+1)·interval)`. Intervals without samples are
 * empty arrays; negative or non-finite times are dropped.
 */
export function bucketByInterval(samples: readonly TimedSample[], intervalSeconds: number): number[][] {
  const valid = samples.filter(s => Number.isFinite(s.time) && s.time >= 0)
  if (valid.length === 0 || !(intervalSeconds > 0)) return []

  const lastTime = maxOf(valid.map(s => s.time))
  const buckets: number[][] = Array.from({ length: Math.floor(lastTime / intervalSeconds) + 1 }, () => [])
  for (const sample of valid) {
    buckets[Math.floor(sample.time / intervalSeconds)].push(sample.value)
  }
  return buckets
}

/** Per-interval mean of the samples; empty intervals score 0. */
export function intervalMeans(samples: readonly TimedSample[], intervalSeconds: number): Timeline {
  return bucketByInterval(samples, intervalSeconds).map(bucket => (bucket.length === 0 ? 0 : mean(bucket)))
}
