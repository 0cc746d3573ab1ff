import { probeSceneScores } from '../../L2-clients/ffmpeg/sceneProbe.js'
import { visualTimeline } from '../../L0-pure/signals/signals.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AnalyzerProgress, ModalityAnalyzer } from './types.js'
import type { ModalityAnalysis } from '../../types/index.js'

/** Motion / scene-change intensity from FFmpeg's per-frame scene score. */
export class VisualAnalyzer implements ModalityAnalyzer {
  readonly modality = 'visual' as const

  constructor(
    private readonly intervalSeconds: number,
    private readonly sampleFps: number = 4,
  ) {}

  async produceTimeline(sourcePath: string, progress: AnalyzerProgress): Promise<ModalityAnalysis> {
    progress(10, 'Sampling frames')
    const scenes = await probeSceneScores(sourcePath, this.sampleFps)
    if (scenes.length === 0) {
      throw new Error(`No frames decoded from ${sourcePath} — does the file have a video track?`)
    }

    progress(60, 'Scoring movement intensity')
    const analysis = visualTimeline(scenes, this.intervalSeconds)

    progress(90, 'Visual timeline ready')
    logger.info(`[VisualAnalyzer] ${analysis.timeline.length} intervals scored`)
    return analysis
  }

  async cleanup(): Promise<void> {
    // ffmpeg runs out of process; nothing is held between runs
  }
}
