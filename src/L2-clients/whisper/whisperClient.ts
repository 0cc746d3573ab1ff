import { OpenAI } from '../../L1-infra/ai/openai.js'
import { fileExistsSync, getFileStatsSync, openReadStream } from '../../L1-infra/fileSystem/fileSystem.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'

const MAX_FILE_SIZE_MB = 25
const WARN_FILE_SIZE_MB = 20
const MAX_RETRIES = 3
const RETRY_DELAY_MS = 5000

/** A spoken word with start/end in seconds from the beginning of the audio. */
export interface TranscriptWord {
  word: string
  start: number
  end: number
}

export interface WordTranscript {
  text: string
  words: TranscriptWord[]
  language: string
  duration: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function toWord(raw: unknown): TranscriptWord | null {
  if (!isRecord(raw)) return null
  const { word, start, end } = raw
  if (typeof word !== 'string' || typeof start !== 'number' || typeof end !== 'number') return null
  return { word, start, end }
}

function statusOf(error: unknown): number | undefined {
  return isRecord(error) && typeof error.status === 'number' ? error.status : undefined
}

/** Pull text, words, language and duration out of a `verbose_json` response body. */
export function parseVerboseTranscription(response: unknown): WordTranscript {
  if (!isRecord(response)) {
    throw new Error('Unexpected Whisper response: not an object')
  }
  const rawWords = Array.isArray(response.words) ? response.words : []
  const words = rawWords.map(toWord).filter((w): w is TranscriptWord => w !== null)

  return {
    text: typeof response.text === 'string' ? response.text : '',
    words,
    language: typeof response.language === 'string' ? response.language : 'unknown',
    duration: typeof response.duration === 'number' ? response.duration : 0,
  }
}

/** Transcribe an audio file with word-level timestamps. */
export async function transcribeWords(audioPath: string): Promise<WordTranscript> {
  logger.info(`Starting Whisper transcription: ${audioPath}`)

  if (!fileExistsSync(audioPath)) {
    throw new Error(`Audio file not found: ${audioPath}`)
  }

  const stats = getFileStatsSync(audioPath)
  const fileSizeMB = stats.size / (1024 * 1024)
  if (fileSizeMB > MAX_FILE_SIZE_MB) {
    throw new Error(
      `Audio file exceeds Whisper's 25MB limit (${fileSizeMB.toFixed(1)}MB). ` +
      'Split it with splitAudioIntoChunks before transcribing.'
    )
  }
  if (fileSizeMB > WARN_FILE_SIZE_MB) {
    logger.warn(`Audio file is ${fileSizeMB.toFixed(1)}MB — approaching 25MB limit`)
  }

  const config = getConfig()
  const openai = new OpenAI({ apiKey: config.OPENAI_API_KEY })

  let response: unknown
  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    try {
      response = await openai.audio.transcriptions.create({
        model: config.WHISPER_MODEL,
        file: openReadStream(audioPath),
        response_format: 'verbose_json',
        timestamp_granularities: ['word'],
      })
      break
    } catch (retryError: unknown) {
      const status = statusOf(retryError)
      if (status === 401 || status === 400 || status === 429) throw retryError
      if (attempt === MAX_RETRIES) throw retryError
      const msg = retryError instanceof Error ? retryError.message : String(retryError)
      logger.warn(`Whisper attempt ${attempt}/${MAX_RETRIES} failed: ${msg} — retrying in ${RETRY_DELAY_MS / 1000}s`)
      await new Promise(resolve => setTimeout(resolve, RETRY_DELAY_MS))
    }
  }

  if (response === undefined) throw new Error('Whisper transcription failed after all retries')

  const transcript = parseVerboseTranscription(response)
  logger.info(`Transcription complete — ${transcript.words.length} words, language=${transcript.language}`)
  return transcript
}
