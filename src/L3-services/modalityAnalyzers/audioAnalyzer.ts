import { probeLoudness } from '../../L2-clients/ffmpeg/loudnessProbe.js'
import { audioTimeline } from '../../L0-pure/signals/signals.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AnalyzerProgress, ModalityAnalyzer } from './types.js'
import type { ModalityAnalysis } from '../../types/index.js'

/** Audio energy and volume variation from EBU R128 momentary loudness. */
export class AudioAnalyzer implements ModalityAnalyzer {
  readonly modality = 'audio' as const

  constructor(private readonly intervalSeconds: number) {}

  async produceTimeline(sourcePath: string, progress: AnalyzerProgress): Promise<ModalityAnalysis> {
    progress(10, 'Measuring loudness')
    const loudness = await probeLoudness(sourcePath)
    if (loudness.length === 0) {
      throw new Error(`No audio loudness data for ${sourcePath} — does the file have an audio track?`)
    }

    progress(50, 'Scoring energy and volume variation')
    const analysis = audioTimeline(loudness, this.intervalSeconds)

    progress(90, 'Audio timeline ready')
    logger.info(`[AudioAnalyzer] ${analysis.timeline.length} intervals scored`)
    return analysis
  }

  async cleanup(): Promise<void> {
    // ffmpeg runs out of process; nothing is held between runs
  }
}
