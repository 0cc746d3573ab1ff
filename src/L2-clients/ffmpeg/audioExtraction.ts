import { createFFmpeg, getMediaDuration } from './ffmpeg.js'
import { ensureDirectory, getFileStats } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname, extname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'

/**
 * Extract audio from a video file to mono MP3 at 64kbps (small enough for Whisper).
 * A 10-minute video produces ~5MB MP3 vs ~115MB WAV.
 */
export async function extractAudio(videoPath: string, outputPath: string): Promise<string> {
  await ensureDirectory(dirname(outputPath))

  logger.info(`Extracting audio: ${videoPath} → ${outputPath}`)

  return new Promise<string>((resolve, reject) => {
    createFFmpeg(videoPath)
      .noVideo()
      .audioChannels(1)
      .audioCodec('libmp3lame')
      .audioBitrate('64k')
      .audioFrequency(16000)
      .output(outputPath)
      .on('end', () => {
        logger.info(`Audio extraction complete: ${outputPath}`)
        resolve(outputPath)
      })
      .on('error', (err: Error) => {
        logger.error(`Audio extraction failed: ${err.message}`)
        reject(new Error(`Audio extraction failed: ${err.message}`))
      })
      .run()
  })
}

/** One piece of a split audio file and where it begins in the original. */
export interface AudioChunk {
  path: string
  startSeconds: number
}

/**
 * Split an audio file into chunks of approximately `maxChunkSizeMB` each,
 * cutting by duration in proportion to the file size. A file already under
 * the limit comes back as a single chunk starting at 0.
 */
export async function splitAudioIntoChunks(
  audioPath: string,
  maxChunkSizeMB: number = 24,
): Promise<AudioChunk[]> {
  const stats = await getFileStats(audioPath)
  const fileSizeMB = stats.size / (1024 * 1024)

  if (fileSizeMB <= maxChunkSizeMB) {
    return [{ path: audioPath, startSeconds: 0 }]
  }

  const duration = await getMediaDuration(audioPath)
  const numChunks = Math.ceil(fileSizeMB / maxChunkSizeMB)
  const chunkDuration = duration / numChunks

  const ext = extname(audioPath)
  const base = audioPath.slice(0, audioPath.length - ext.length)
  const chunks: AudioChunk[] = []

  logger.info(
    `Splitting ${fileSizeMB.toFixed(1)}MB audio into ${numChunks} chunks ` +
    `(~${chunkDuration.toFixed(0)}s each)`
  )

  for (let i = 0; i < numChunks; i++) {
    const chunk = { path: `${base}_chunk${i}${ext}`, startSeconds: i * chunkDuration }

    await new Promise<void>((resolve, reject) => {
      createFFmpeg(audioPath)
        .setStartTime(chunk.startSeconds)
        .setDuration(chunkDuration)
        .audioCodec('copy')
        .output(chunk.path)
        .on('end', () => resolve())
        .on('error', (err: Error) => reject(new Error(`Chunk split failed: ${err.message}`)))
        .run()
    })

    chunks.push(chunk)
    logger.info(`Created chunk ${i + 1}/${numChunks}: ${chunk.path}`)
  }

  return chunks
}
