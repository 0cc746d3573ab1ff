import { fluentFfmpeg as ffmpegLib } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { createModuleRequire } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

const require = createModuleRequire(import.meta.url)

/** Resolve a binary shipped by an npm installer package, if one is installed. */
function installerPath(pkg: string): string | undefined {
  try {
    const installed: unknown = require(pkg)
    if (typeof installed === 'object' && installed !== null && 'path' in installed && typeof installed.path === 'string') {
      return fileExistsSync(installed.path) ? installed.path : undefined
    }
  } catch (err: unknown) {
    logger.debug(`${pkg} unavailable: ${err instanceof Error ? err.message : String(err)}`)
  }
  return undefined
}

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH && config.FFMPEG_PATH !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  const installed = installerPath('@ffmpeg-installer/ffmpeg')
  if (installed) {
    logger.debug(`FFmpeg: using @ffmpeg-installer/ffmpeg: ${installed}`)
    return installed
  }
  logger.debug('FFmpeg: falling back to system PATH')
  return 'ffmpeg'
}

/** Get the resolved path to the FFprobe binary. */
export function getFFprobePath(): string {
  const config = getConfig()
  if (config.FFPROBE_PATH && config.FFPROBE_PATH !== 'ffprobe') {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${config.FFPROBE_PATH}`)
    return config.FFPROBE_PATH
  }
  const installed = installerPath('@ffprobe-installer/ffprobe')
  if (installed) {
    logger.debug(`FFprobe: using @ffprobe-installer/ffprobe: ${installed}`)
    return installed
  }
  logger.debug('FFprobe: falling back to system PATH')
  return 'ffprobe'
}

/** Create a pre-configured fluent-ffmpeg instance. */
export function createFFmpeg(input?: string): ffmpegLib.FfmpegCommand {
  const cmd = input ? ffmpegLib(input) : ffmpegLib()
  cmd.setFfmpegPath(getFFmpegPath())
  cmd.setFfprobePath(getFFprobePath())
  return cmd
}

/** Promisified ffprobe — get media file metadata. */
export function ffprobe(filePath: string): Promise<ffmpegLib.FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpegLib.setFfprobePath(getFFprobePath())
    ffmpegLib.ffprobe(filePath, (err: unknown, data) => {
      if (err) reject(err instanceof Error ? err : new Error(String(err)))
      else resolve(data)
    })
  })
}

/** Duration of a media file in seconds (0 when ffprobe reports none). */
export async function getMediaDuration(filePath: string): Promise<number> {
  const metadata = await ffprobe(filePath)
  return metadata.format.duration ?? 0
}

export type { FfmpegCommand, FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
