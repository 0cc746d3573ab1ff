/**
 * Small descriptive-statistics helpers over plain number arrays.
 * Every function returns 0 for an empty input unless noted.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

/** Population standard deviation (divides by n). */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0
  const avg = mean(values)
  let squares = 0
  for (const v of values) squares += (v - avg) ** 2
  return Math.sqrt(squares / values.length)
}

/**
 * Percentile with linear interpolation between closest ranks
 * (rank = p/100 · (n − 1) over the sorted values).
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0
  const sorted = [...values].sort((a, b) => a - b)
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (sorted.length - 1)
  const lower = Math.floor(rank)
  const upper = Math.ceil(rank)
  if (lower === upper) return sorted[lower]
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower)
}

// Not Math.min(...values): spreading overflows the call stack past ~125k values
export function minOf(values: readonly number[]): number {
  if (values.length === 0) return 0
  let lo = values[0]
  for (const v of values) if (v < lo) lo = v
  return lo
}

export function maxOf(values: readonly number[]): number {
  if (values.length === 0) return 0
  let hi = values[0]
  for (const v of values) if (v > hi) hi = v
  return hi
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi)
}
