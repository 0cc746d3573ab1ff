import { describe, it, expect } from 'vitest'
import { bucketByInterval, intervalMeans } from '../../../L0-pure/timeline/timeline.js'

const samples = [
  { time: 0.2, value: 1 },
  { time: 0.7, value: 3 },
  { time: 2.1, value: 5 },
]

describe('timeline bucketing', () => {
  it('groups samples by interval, leaving gaps empty', () => {
    expect(bucketByInterval(samples, 1)).toEqual([[1, 3], [], [5]])
  })

  it('uses the interval width', () => {
    expect(bucketByInterval(samples, 0.5)).toEqual([[1], [3], [], [], [5]])
  })

  it('drops negative and non-finite times', () => {
    expect(bucketByInterval([{ time: -1, value: 9 }, { time: Number.NaN, value: 9 }, { time: 0, value: 2 }], 1)).toEqual([[2]])
  })

  it('returns [] without samples or with a non-positive interval', () => {
    expect(bucketByInterval([], 1)).toEqual([])
    expect(bucketByInterval(samples, 0)).toEqual([])
  })

  it('intervalMeans scores empty intervals 0', () => {
    expect(intervalMeans(samples, 1)).toEqual([2, 0, 5])
  })

  it('buckets 200k samples without overflowing the stack', () => {
    const dense = Array.from({ length: 200_000 }, (_, i) => ({ time: i / 10, value: 1 }))
    const buckets = bucketByInterval(dense, 1)

    expect(buckets).toHaveLength(20_000)
    expect(buckets[19_999]).toHaveLength(10)
  })
})
