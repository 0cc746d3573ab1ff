import { createFFmpeg } from './ffmpeg.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { TimedSample } from '../../L0-pure/timeline/timeline.js'

// [Parsed_ebur128_0 @ 0x...] t: 1.3      TARGET:-23 LUFS    M: -21.4 S: -120.7 ...
const EBUR128_LINE = /\bt:\s*([\d.]+)\s+.*?\bM:\s*(-?[\d.]+|-?inf)/

/** Parse ebur128 frame-log lines into momentary loudness samples (LUFS). */
export function parseLoudnessLog(lines: readonly string[]): TimedSample[] {
  const samples: TimedSample[] = []
  for (const line of lines) {
    const match = line.match(EBUR128_LINE)
    if (!match) continue
    const value = match[2].endsWith('inf') ? Number.NEGATIVE_INFINITY : parseFloat(match[2])
    samples.push({ time: parseFloat(match[1]), value })
  }
  return samples
}

/**
 * Measure momentary loudness (EBU R128, 400ms window, reported every 100ms)
 * across the whole audio track of a media file.
 */
export async function probeLoudness(mediaPath: string): Promise<TimedSample[]> {
  logger.info(`Probing loudness: ${mediaPath}`)

  return new Promise<TimedSample[]>((resolve, reject) => {
    const lines: string[] = []

    createFFmpeg(mediaPath)
      .noVideo()
      .audioFilters('ebur128=framelog=verbose')
      .format('null')
      .output('-')
      .on('stderr', (line: string) => {
        lines.push(line)
      })
      .on('end', () => {
        const samples = parseLoudnessLog(lines)
        logger.info(`Loudness probe complete: ${samples.length} samples`)
        resolve(samples)
      })
      .on('error', (err: Error) => {
        logger.error(`Loudness probe failed: ${err.message}`)
        reject(new Error(`Loudness probe failed: ${err.message}`))
      })
      .run()
  })
}
