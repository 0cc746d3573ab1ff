import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockWriteJsonFile = vi.hoisted(() => vi.fn(async (_path: string, _data: unknown): Promise<void> => undefined))

vi.mock('../../../L1-infra/fileSystem/fileSystem.js', () => ({
  writeJsonFile: mockWriteJsonFile,
}))

// Logger is auto-mocked by global setup.ts

import logger from '../../../L1-infra/logger/configLogger.js'
import { EngagementScorer } from '../../../L3-services/engagementScorer/engagementScorer.js'
import { getBestSegments } from '../../../L0-pure/engagement/segments.js'
import { DEFAULT_ENGAGEMENT_CONFIG } from '../../../types/index.js'
import type { EngagementConfig, SegmentCandidate } from '../../../types/index.js'

function segment(startTime: number, endTime: number, combinedScore: number, rank: number): SegmentCandidate {
  return {
    startTime,
    endTime,
    duration: endTime - startTime,
    audioScore: 0,
    visualScore: 0,
    speechScore: 0,
    combinedScore,
    rank,
  }
}

const selected = [segment(0, 60, 0.5, 2), segment(100, 160, 0.9, 1)]

describe('EngagementScorer', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    mockWriteJsonFile.mockImplementation(async () => undefined)
  })

  it('copies its config', () => {
    const config: EngagementConfig = { ...DEFAULT_ENGAGEMENT_CONFIG, weights: { audio: 0.5, visual: 0.25, speech: 0.25 } }
    const scorer = new EngagementScorer(config)
    config.weights.audio = 1

    expect(scorer.config.weights.audio).toBe(0.5)
  })

  it('getBestSegments matches the pure pipeline', () => {
    const timeline = Array.from({ length: 120 }, (_, i) => Math.sin(i / 7) + 1)
    const scorer = new EngagementScorer()

    expect(scorer.getBestSegments(timeline, timeline, timeline, 20, 3, 120)).toEqual(
      getBestSegments(
        { audio: timeline, visual: timeline, speech: timeline },
        { durationSeconds: 20, count: 3, totalDurationSeconds: 120, intervalSeconds: 1 },
        DEFAULT_ENGAGEMENT_CONFIG,
      ),
    )
  })

  it('warns when nothing can be selected', () => {
    const scorer = new EngagementScorer()

    expect(scorer.getBestSegments([], [], [], 60, 5)).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith('[EngagementScorer] No segments could be selected')
  })

  it('normalize defaults to the configured method', () => {
    const scorer = new EngagementScorer({ ...DEFAULT_ENGAGEMENT_CONFIG, normalizationMethod: 'robust' })

    expect(scorer.normalize([0, 1, 2, 3, 4])).toEqual([0, 0, 0.5, 1, 1])
    expect(scorer.normalize([0, 1, 2, 3, 4], 'minmax')).toEqual([0, 0.25, 0.5, 0.75, 1])
  })

  it('getAnalysisSummary uses the scorer config', () => {
    const scorer = new EngagementScorer()

    expect(scorer.getAnalysisSummary(selected)?.configUsed).toEqual(DEFAULT_ENGAGEMENT_CONFIG)
    expect(scorer.getAnalysisSummary([])).toBeNull()
  })

  describe('buildExport', () => {
    it('summarizes the selection', () => {
      const exported = new EngagementScorer().buildExport(selected)

      expect(exported.segments).toEqual(selected)
      expect(exported.summary.totalSegments).toBe(2)
      expect(exported.summary.averageScore).toBeCloseTo(0.7)
      expect(exported.summary.scoreRange).toEqual({ min: 0.5, max: 0.9 })
      expect(exported.summary.totalShortsDuration).toBe(120)
      expect(exported.summary.coveragePercentage).toBe(75)
    })

    it('handles an empty selection', () => {
      const { summary } = new EngagementScorer().buildExport([])

      expect(summary).toEqual({
        totalSegments: 0,
        averageScore: 0,
        scoreRange: { min: 0, max: 0 },
        totalShortsDuration: 0,
        coveragePercentage: 0,
      })
    })
  })

  describe('exportAnalysisResults', () => {
    it('writes the export and reports success', async () => {
      const ok = await new EngagementScorer().exportAnalysisResults(selected, '/out/engagement-analysis.json')

      expect(ok).toBe(true)
      expect(mockWriteJsonFile).toHaveBeenCalledWith(
        '/out/engagement-analysis.json',
        expect.objectContaining({ segments: selected }),
      )
    })

    it('logs and reports failure instead of throwing', async () => {
      mockWriteJsonFile.mockRejectedValueOnce(new Error('EACCES'))

      const ok = await new EngagementScorer().exportAnalysisResults(selected, '/out/engagement-analysis.json')

      expect(ok).toBe(false)
      expect(logger.error).toHaveBeenCalledWith(
        '[EngagementScorer] Failed to export analysis to /out/engagement-analysis.json: EACCES',
      )
    })
  })
})
