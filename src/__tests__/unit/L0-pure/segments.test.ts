import { describe, it, expect } from 'vitest'
import {
  applyDistributionBonus,
  applySeparationPenalty,
  combine,
  generateCandidates,
  getBestSegments,
  scorePerModality,
  segmentDistance,
  selectTopSegments,
  windowSamples,
} from '../../../L0-pure/engagement/segments.js'
import { DEFAULT_ENGAGEMENT_CONFIG } from '../../../types/index.js'
import type { EngagementConfig, SegmentCandidate } from '../../../types/index.js'

const config: EngagementConfig = DEFAULT_ENGAGEMENT_CONFIG

function candidate(startTime: number, endTime: number, combinedScore: number): SegmentCandidate {
  return {
    startTime,
    endTime,
    duration: endTime - startTime,
    audioScore: 0,
    visualScore: 0,
    speechScore: 0,
    combinedScore,
    rank: 0,
  }
}

/** 300 one-second samples: 1 on [90, 150), 0 elsewhere. */
function peakTimeline(length = 300): number[] {
  return Array.from({ length }, (_, i) => (i >= 90 && i < 150 ? 1 : 0))
}

describe('combine', () => {
  it('truncates to the shortest timeline and applies the weights', () => {
    const combined = combine([0, 10], [0, 1, 99], [5, 0], config)
    expect(combined).toHaveLength(2)
    expect(combined[0]).toBeCloseTo(0.3)
    expect(combined[1]).toBeCloseTo(0.7)
  })

  it('returns [] when any timeline is empty', () => {
    expect(combine([1, 2], [], [3, 4], config)).toEqual([])
  })

  it('scores a contrast-free timeline as no information', () => {
    const combined = combine([2, 2], [7, 7], [0, 0], config)
    expect(combined[0]).toBeCloseTo(0.5)
    expect(combined[1]).toBeCloseTo(0.5)
  })
})

describe('generateCandidates', () => {
  it('slides a half-overlapping window and averages it', () => {
    const combined = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]
    const candidates = generateCandidates(combined, 1, { ...config, segmentDurationSeconds: 4 })

    expect(candidates.map(c => c.startTime)).toEqual([0, 2, 4, 6])
    expect(candidates.map(c => c.combinedScore)).toEqual([1.5, 3.5, 5.5, 7.5])
    expect(candidates.every(c => c.duration === 4 && c.rank === 0)).toBe(true)
  })

  it('expresses times in seconds for non-unit intervals', () => {
    const candidates = generateCandidates([1, 1, 1, 1, 1], 2, { ...config, segmentDurationSeconds: 4 })

    expect(candidates.map(c => [c.startTime, c.endTime])).toEqual([[0, 4], [2, 6], [4, 8], [6, 10]])
  })

  it('never produces a partial window', () => {
    const candidates = generateCandidates(new Array<number>(10).fill(1), 1, { ...config, segmentDurationSeconds: 20 })
    expect(candidates).toEqual([])
  })

  it('produces floor((L - w) / s) + 1 candidates', () => {
    for (const [length, duration] of [[300, 60], [61, 60], [100, 7], [50, 1]]) {
      const w = windowSamples(duration, 1)
      const s = Math.max(1, Math.floor(w / 2))
      const candidates = generateCandidates(new Array<number>(length).fill(0), 1, { ...config, segmentDurationSeconds: duration })
      expect(candidates).toHaveLength(Math.floor((length - w) / s) + 1)
    }
  })
})

describe('scorePerModality', () => {
  it('averages each raw timeline over the candidate range', () => {
    const [scored] = scorePerModality(
      [candidate(2, 4, 0.5)],
      { audio: [0, 0, 4, 6, 0], visual: [1, 1], speech: [0, 0, 3] },
      1,
    )

    expect(scored.audioScore).toBe(5)
    expect(scored.visualScore).toBe(0)
    expect(scored.speechScore).toBe(3)
    expect(scored.combinedScore).toBe(0.5)
  })
})

describe('segmentDistance', () => {
  it('is the nearer end-to-start distance', () => {
    expect(segmentDistance(candidate(0, 60, 0), candidate(90, 150, 0))).toBe(30)
    expect(segmentDistance(candidate(90, 150, 0), candidate(0, 60, 0))).toBe(30)
    expect(segmentDistance(candidate(0, 60, 0), candidate(60, 120, 0))).toBe(0)
  })
})

describe('applySeparationPenalty', () => {
  const a = candidate(0, 60, 0.9)
  const b = candidate(60, 120, 0.8)
  const c = candidate(100, 160, 0.7)
  const e = candidate(120, 180, 0.5)

  it('demotes candidates too close to a better accepted one', () => {
    const result = applySeparationPenalty([c, a, e, b], config)

    expect(result.map(r => r.startTime)).toEqual([0, 60, 100, 120])
    expect(result[0].combinedScore).toBe(0.9)
    expect(result[1].combinedScore).toBeCloseTo(0.4)
    expect(result[2].combinedScore).toBe(0.7)
  })

  it('only compares against accepted candidates', () => {
    // e touches b, but b was rejected
    const result = applySeparationPenalty([a, b, c, e], config)
    expect(result[3].combinedScore).toBe(0.5)
  })

  it('demotes the weaker of two candidates 10 seconds apart', () => {
    const [strong, weak] = applySeparationPenalty([candidate(70, 130, 0.8), candidate(0, 60, 0.9)], config)

    expect(strong.combinedScore).toBe(0.9)
    expect(weak.startTime).toBe(70)
    expect(weak.combinedScore).toBeCloseTo(0.8 * config.overlapPenaltyFactor)
  })

  it('keeps every candidate and never raises a score', () => {
    const input = [a, b, c, e, candidate(10, 70, 0.6), candidate(20, 80, 0.95)]
    const result = applySeparationPenalty(input, config)

    expect(result).toHaveLength(input.length)
    for (const r of result) {
      const original = input.find(i => i.startTime === r.startTime)
      expect(r.combinedScore).toBeLessThanOrEqual(original?.combinedScore ?? Number.NaN)
    }
  })

  it('leaves its input untouched', () => {
    applySeparationPenalty([a, b], config)
    expect(b.combinedScore).toBe(0.8)
  })
})

describe('applyDistributionBonus', () => {
  it('shares the bonus among the candidates of each time bucket', () => {
    const result = applyDistributionBonus(
      [candidate(0, 10, 0), candidate(10, 20, 0), candidate(50, 60, 0), candidate(99, 109, 0), candidate(100, 110, 0)],
      100,
      config,
    )

    const scores = result.map(r => r.combinedScore)
    expect(scores[0]).toBeCloseTo(0.05)
    expect(scores[1]).toBeCloseTo(0.05)
    expect(scores[2]).toBeCloseTo(0.1)
    // start 100 lands in the last bucket together with start 99
    expect(scores[3]).toBeCloseTo(0.05)
    expect(scores[4]).toBeCloseTo(0.05)
  })

  it('is a no-op without a positive total duration', () => {
    const input = [candidate(0, 10, 0.3)]
    expect(applyDistributionBonus(input, 0, config)).toEqual(input)
  })
})

describe('selectTopSegments', () => {
  const pool = [candidate(0, 60, 0.2), candidate(60, 120, 0.9), candidate(120, 180, 0.5), candidate(180, 240, 0.7)]

  it('ranks by score and returns chronological order', () => {
    const selected = selectTopSegments(pool, 3)

    expect(selected.map(s => [s.startTime, s.rank])).toEqual([[60, 1], [120, 3], [180, 2]])
  })

  it('returns everything when fewer candidates than requested', () => {
    expect(selectTopSegments(pool, 10)).toHaveLength(4)
  })

  it('returns [] for a non-positive count', () => {
    expect(selectTopSegments(pool, 0)).toEqual([])
  })
})

describe('getBestSegments', () => {
  const timelines = { audio: peakTimeline(), visual: peakTimeline(), speech: peakTimeline() }

  it('splits a flat video evenly between equal candidates', () => {
    const flat = new Array<number>(120).fill(1)
    const selected = getBestSegments({ audio: flat, visual: flat, speech: flat }, { durationSeconds: 60, count: 2 }, config)

    expect(selected.map(s => s.startTime)).toEqual([0, 30])
    expect(selected.map(s => s.rank).sort()).toEqual([1, 2])
    expect(selected[0].combinedScore).toBe(selected[1].combinedScore)
  })

  it('finds the single engaging region', () => {
    const [best, ...rest] = getBestSegments(timelines, { durationSeconds: 60, count: 1 }, config)

    expect(rest).toEqual([])
    expect(best.startTime).toBe(90)
    expect(best.endTime).toBe(150)
    expect(best.rank).toBe(1)
    expect(best.audioScore).toBe(1)
    expect(best.combinedScore).toBeCloseTo(1)
  })

  it('spreads selections and penalizes crowded neighbours', () => {
    const selected = getBestSegments(timelines, { durationSeconds: 60, count: 3 }, config)

    expect(selected.map(s => [s.startTime, s.rank])).toEqual([[60, 2], [90, 1], [120, 3]])
    expect(selected[0].combinedScore).toBeCloseTo(0.5)
    expect(selected[2].combinedScore).toBeCloseTo(0.25)
  })

  it('adds the distribution bonus when the total duration is known', () => {
    const [best] = getBestSegments(timelines, { durationSeconds: 60, count: 1, totalDurationSeconds: 300 }, config)
    // bucket [60, 120) holds the candidates starting at 60 and 90
    expect(best.combinedScore).toBeCloseTo(1.05)
  })

  it('keeps every candidate inside the shortest timeline', () => {
    const selected = getBestSegments(
      { audio: peakTimeline(300), visual: peakTimeline(280), speech: peakTimeline(290) },
      { durationSeconds: 60, count: 10 },
      config,
    )
    expect(Math.max(...selected.map(s => s.endTime))).toBeLessThanOrEqual(280)
  })

  it('returns [] when a timeline is empty', () => {
    expect(getBestSegments({ audio: [], visual: [1], speech: [1] }, { durationSeconds: 1, count: 3 }, config)).toEqual([])
  })

  it('assigns ranks 1..n in chronological output', () => {
    const selected = getBestSegments(timelines, { durationSeconds: 30, count: 5, totalDurationSeconds: 300 }, config)

    expect(selected.map(s => s.rank).sort((x, y) => x - y)).toEqual([1, 2, 3, 4, 5])
    const starts = selected.map(s => s.startTime)
    expect(starts).toEqual([...starts].sort((x, y) => x - y))
  })

  it('is deterministic', () => {
    const request = { durationSeconds: 45, count: 4, totalDurationSeconds: 300 }
    expect(getBestSegments(timelines, request, config)).toEqual(getBestSegments(timelines, request, config))
  })
})
