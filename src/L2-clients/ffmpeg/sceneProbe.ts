import { createFFmpeg } from './ffmpeg.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { TimedSample } from '../../L0-pure/timeline/timeline.js'

const PTS_TIME = /pts_time:\s*([\d.]+)/
const SCENE_SCORE = /lavfi\.scene_score=([\d.]+)/

/**
 * Parse `metadata=print` output. Each frame logs its `pts_time` on one line
 * and its `lavfi.scene_score` on a following line.
 */
export function parseSceneLog(lines: readonly string[]): TimedSample[] {
  const samples: TimedSample[] = []
  let pendingTime: number | null = null

  for (const line of lines) {
    const timeMatch = line.match(PTS_TIME)
    if (timeMatch) {
      pendingTime = parseFloat(timeMatch[1])
      continue
    }
    const scoreMatch = line.match(SCENE_SCORE)
    if (scoreMatch && pendingTime !== null) {
      samples.push({ time: pendingTime, value: parseFloat(scoreMatch[1]) })
      pendingTime = null
    }
  }
  return samples
}

/**
 * Score every frame by how much it differs from the previous one (FFmpeg's
 * `scene` metric, 0–1). Frames are downscaled first to keep the probe cheap.
 */
export async function probeSceneScores(videoPath: string, sampleFps: number = 4): Promise<TimedSample[]> {
  logger.info(`Probing scene scores: ${videoPath} (${sampleFps} fps)`)

  return new Promise<TimedSample[]>((resolve, reject) => {
    const lines: string[] = []

    createFFmpeg(videoPath)
      .noAudio()
      .videoFilters([`fps=${sampleFps}`, 'scale=320:-2', "select='gte(scene,0)'", 'metadata=print'])
      .format('null')
      .output('-')
      .on('stderr', (line: string) => {
        lines.push(line)
      })
      .on('end', () => {
        const samples = parseSceneLog(lines)
        logger.info(`Scene probe complete: ${samples.length} frames`)
        resolve(samples)
      })
      .on('error', (err: Error) => {
        logger.error(`Scene probe failed: ${err.message}`)
        reject(new Error(`Scene probe failed: ${err.message}`))
      })
      .run()
  })
}
