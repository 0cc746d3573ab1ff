import { join, basename, extname } from '../L1-infra/paths/paths.js'
import { writeJsonFile, writeTextFile, ensureDirectory } from '../L1-infra/fileSystem/fileSystem.js'
import logger, { pushPipe, popPipe } from '../L1-infra/logger/configLogger.js'
import { getConfig } from '../L1-infra/config/environment.js'
import { loadEngagementConfig } from '../L1-infra/config/engagementConfig.js'
import { slugify, formatTimestamp } from '../L0-pure/text/text.js'
import { AnalysisOrchestrator } from '../L3-services/analysisOrchestrator/analysisOrchestrator.js'
import { EngagementScorer } from '../L3-services/engagementScorer/engagementScorer.js'
import type {
  AnalysisResults,
  CompleteAnalysis,
  EngagementConfig,
  SegmentCandidate,
} from '../types/index.js'

export const DEFAULT_SHORTS_DURATION = 60
export const DEFAULT_SHORTS_COUNT = 7

export interface AnalyzeVideoOptions {
  /** Length of each selected segment in seconds (default 60). */
  durationSeconds?: number
  /** How many segments to select (default 7). */
  count?: number
  /** Parent folder for per-video reports (default: OUTPUT_DIR). */
  outputDir?: string
  /** Scoring settings (default: engagement.json, or the built-in defaults). */
  engagementConfig?: EngagementConfig
  /** Reuse an orchestrator (and its progress state) across calls. */
  orchestrator?: AnalysisOrchestrator
}

/** Longest timeline × interval — the best available estimate of the video length. */
export function estimateTotalDuration(results: AnalysisResults, intervalSeconds: number): number {
  const longest = Math.max(
    results.audio.timeline.length,
    results.visual.timeline.length,
    results.speech.timeline.length,
  )
  return longest * intervalSeconds
}

/**
 * Score the analysis results into ranked segments. Returns `[]` when every
 * modality failed.
 */
export function findBestSegments(
  scorer: EngagementScorer,
  results: AnalysisResults,
  durationSeconds: number,
  count: number,
  intervalSeconds: number,
): SegmentCandidate[] {
  const { audio, visual, speech } = results
  if (audio.timeline.length === 0 && visual.timeline.length === 0 && speech.timeline.length === 0) {
    logger.error('No timeline available for scoring — every modality failed')
    return []
  }

  return scorer.getBestSegments(
    audio.timeline,
    visual.timeline,
    speech.timeline,
    durationSeconds,
    count,
    estimateTotalDuration(results, intervalSeconds),
    intervalSeconds,
  )
}

/** Folder-safe name for a video's report directory. */
export function videoSlug(videoPath: string): string {
  const name = basename(videoPath, extname(videoPath))
  return slugify(name) || 'video'
}

export function generateSegmentsMarkdown(analysis: CompleteAnalysis): string {
  let md = `# Engagement Segments — ${basename(analysis.sourcePath)}\n\n`
  md += `| Metric | Value |\n|--------|-------|\n`
  md += `| Segments Found | ${analysis.summary.segmentsFound} / ${analysis.summary.shortsCount} |\n`
  md += `| Segment Length | ${analysis.summary.shortsDuration}s |\n`
  md += `| Analysis Time | ${analysis.summary.totalAnalysisTime.toFixed(1)}s |\n`
  md += '\n'

  if (analysis.bestSegments.length === 0) {
    md += '_No segments could be produced._\n'
    return md
  }

  md += '## Segments\n\n| Rank | Start | End | Combined | Audio | Visual | Speech |\n'
  md += '|------|-------|-----|----------|-------|--------|--------|\n'
  for (const s of analysis.bestSegments) {
    md += `| ${s.rank} | ${formatTimestamp(s.startTime)} | ${formatTimestamp(s.endTime)} | ` +
      `${s.combinedScore.toFixed(3)} | ${s.audioScore.toFixed(3)} | ${s.visualScore.toFixed(3)} | ${s.speechScore.toFixed(3)} |\n`
  }
  return md
}

/**
 * Analyze a video end to end: run every modality (cached, in parallel),
 * select the best segments, and write the reports to
 * `{outputDir}/{slug}/` — `engagement-analysis.json`,
 * `complete-analysis.json`, `segments.md` and `pipeline.log`.
 *
 * Modality failures only reduce scoring quality. The returned
 * `bestSegments` is empty when nothing could be selected; callers must
 * check for that.
 */
export async function analyzeVideoComplete(
  videoPath: string,
  options: AnalyzeVideoOptions = {},
): Promise<CompleteAnalysis> {
  const cfg = getConfig()
  const durationSeconds = options.durationSeconds ?? DEFAULT_SHORTS_DURATION
  const count = options.count ?? DEFAULT_SHORTS_COUNT
  const videoDir = join(options.outputDir ?? cfg.OUTPUT_DIR, videoSlug(videoPath))

  await ensureDirectory(videoDir)
  pushPipe(videoDir)

  try {
    logger.info(`Analysis starting for: ${videoPath}`)

    const orchestrator = options.orchestrator ?? new AnalysisOrchestrator()
    const scorer = new EngagementScorer(options.engagementConfig ?? loadEngagementConfig())
    const intervalSeconds = orchestrator.options.intervalSeconds

    const analysisResults = await orchestrator.analyzeAll(videoPath)
    const bestSegments = findBestSegments(scorer, analysisResults, durationSeconds, count, intervalSeconds)

    await scorer.exportAnalysisResults(bestSegments, join(videoDir, 'engagement-analysis.json'))

    const complete: CompleteAnalysis = {
      sourcePath: videoPath,
      analysisResults,
      bestSegments,
      summary: {
        totalAnalysisTime: analysisResults.metadata.wallClockSeconds,
        segmentsFound: bestSegments.length,
        shortsDuration: durationSeconds,
        shortsCount: count,
      },
    }

    await writeJsonFile(join(videoDir, 'complete-analysis.json'), complete)
    await writeTextFile(join(videoDir, 'segments.md'), generateSegmentsMarkdown(complete))
    logger.info(`Analysis complete: ${bestSegments.length} segments — reports in ${videoDir}`)
    return complete
  } finally {
    popPipe()
  }
}
