import { analyzeVideoComplete } from '../../L6-pipeline/pipeline.js'
import { AnalysisOrchestrator } from '../../L3-services/analysisOrchestrator/analysisOrchestrator.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import { resolve } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { formatTimestamp } from '../../L0-pure/text/text.js'
import type { CompleteAnalysis } from '../../types/index.js'

export interface AnalyzeCommandOptions {
  count: number
  duration: number
}

function printSegments(analysis: CompleteAnalysis): void {
  const { bestSegments } = analysis
  console.log(`\nSelected ${bestSegments.length} of ${analysis.summary.shortsCount} requested segments:\n`)
  console.log('  Rank  Start     End       Score')
  for (const s of bestSegments) {
    console.log(
      `  ${String(s.rank).padEnd(4)}  ${formatTimestamp(s.startTime).padEnd(8)}  ` +
      `${formatTimestamp(s.endTime).padEnd(8)}  ${s.combinedScore.toFixed(3)}`,
    )
  }
  console.log()
}

/**
 * Analyze one video and print the chosen segments. Resolves to the process
 * exit code: 0 with segments, 1 when none could be produced.
 */
export async function runAnalyze(videoPath: string, opts: AnalyzeCommandOptions): Promise<number> {
  const resolvedPath = resolve(videoPath)
  if (!fileExistsSync(resolvedPath)) {
    logger.error(`Video not found: ${resolvedPath}`)
    return 1
  }

  const config = getConfig()
  const orchestrator = new AnalysisOrchestrator({
    onProgress: (modality, percent, status) => {
      if (percent < 0) logger.warn(`[${modality}] failed — ${status}`)
      else logger.info(`[${modality}] ${percent}% ${status}`)
    },
  })

  const analysis = await analyzeVideoComplete(resolvedPath, {
    count: opts.count,
    durationSeconds: opts.duration,
    outputDir: config.OUTPUT_DIR,
    orchestrator,
  })

  if (analysis.bestSegments.length === 0) {
    logger.error('No segments could be produced')
    return 1
  }
  printSegments(analysis)
  return 0
}
