import { describe, it, expect } from 'vitest'
import { normalize, NO_INFORMATION } from '../../../L0-pure/engagement/normalization.js'

describe('normalize', () => {
  it('returns an empty timeline for empty input', () => {
    expect(normalize([])).toEqual([])
    expect(normalize([], 'zscore')).toEqual([])
  })

  it('minmax rescales linearly over the observed range', () => {
    expect(normalize([0, 5, 10], 'minmax')).toEqual([0, 0.5, 1])
    expect(normalize([2, 4])).toEqual([0, 1])
  })

  it('handles a 200k-sample timeline', () => {
    const long = Array.from({ length: 200_000 }, (_, i) => i % 5)
    const normalized = normalize(long, 'minmax')

    expect(normalized).toHaveLength(200_000)
    expect(normalized.slice(0, 5)).toEqual([0, 0.25, 0.5, 0.75, 1])
  })

  it.each(['minmax', 'zscore', 'robust'] as const)('%s maps a constant timeline to 0.5', (method) => {
    expect(normalize([3, 3, 3], method)).toEqual([NO_INFORMATION, NO_INFORMATION, NO_INFORMATION])
  })

  it('zscore standardizes then applies the logistic function', () => {
    const [low, high] = normalize([1, 3], 'zscore')
    expect(low).toBeCloseTo(1 / (1 + Math.E), 10)
    expect(high).toBeCloseTo(1 / (1 + Math.exp(-1)), 10)
    expect(low + high).toBeCloseTo(1, 10)
  })

  it('robust scales by the interquartile range and clips', () => {
    // q25 = 1, q75 = 3
    expect(normalize([0, 1, 2, 3, 4], 'robust')).toEqual([0, 0, 0.5, 1, 1])
  })

  it('falls back to minmax for an unknown method', () => {
    expect(normalize([0, 5, 10], 'median')).toEqual([0, 0.5, 1])
  })

  it('keeps every method inside [0, 1]', () => {
    const scores = [-40, 0, 0.5, 3, 1000]
    for (const method of ['minmax', 'zscore', 'robust'] as const) {
      for (const v of normalize(scores, method)) {
        expect(v).toBeGreaterThanOrEqual(0)
        expect(v).toBeLessThanOrEqual(1)
      }
    }
  })

  it('does not modify its input', () => {
    const scores = [4, 2, 9]
    normalize(scores, 'robust')
    expect(scores).toEqual([4, 2, 9])
  })
})
