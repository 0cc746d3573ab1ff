import fluentFfmpeg from 'fluent-ffmpeg'

export { fluentFfmpeg }
export type { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg'
