import { extractAudio, splitAudioIntoChunks } from '../../L2-clients/ffmpeg/audioExtraction.js'
import { getMediaDuration } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { transcribeWords } from '../../L2-clients/whisper/whisperClient.js'
import { speechTimeline } from '../../L0-pure/signals/signals.js'
import { makeTempDir, removeDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { loadKeywordCatalog } from './keywordCatalog.js'
import type { AudioChunk } from '../../L2-clients/ffmpeg/audioExtraction.js'
import type { WordTranscript } from '../../L2-clients/whisper/whisperClient.js'
import type { AnalyzerProgress, ModalityAnalyzer } from './types.js'
import type { ModalityAnalysis } from '../../types/index.js'

/**
 * Transcribe each chunk in order and merge the results, shifting word
 * timestamps by the chunk's start in the original audio.
 */
async function transcribeChunks(chunks: readonly AudioChunk[], progress: AnalyzerProgress): Promise<WordTranscript> {
  const merged: WordTranscript = { text: '', words: [], language: 'unknown', duration: 0 }

  for (let i = 0; i < chunks.length; i++) {
    const { path, startSeconds } = chunks[i]
    if (chunks.length > 1) {
      progress(20 + Math.round((60 * i) / chunks.length), `Transcribing chunk ${i + 1}/${chunks.length}`)
    }
    const result = await transcribeWords(path)

    if (i === 0) merged.language = result.language
    merged.text += (merged.text ? ' ' : '') + result.text
    for (const w of result.words) {
      merged.words.push({ word: w.word, start: w.start + startSeconds, end: w.end + startSeconds })
    }
    merged.duration = Math.max(merged.duration, startSeconds + result.duration)
  }
  return merged
}

/** Speech activity and keyword density from a Whisper word-level transcript. */
export class SpeechAnalyzer implements ModalityAnalyzer {
  readonly modality = 'speech' as const
  private tempDir: string | null = null

  constructor(private readonly intervalSeconds: number) {}

  async produceTimeline(sourcePath: string, progress: AnalyzerProgress): Promise<ModalityAnalysis> {
    progress(10, 'Extracting audio for transcription')
    this.tempDir = await makeTempDir('segmentscout-speech-')
    const audioPath = await extractAudio(sourcePath, join(this.tempDir, 'speech.mp3'))
    const durationSeconds = await getMediaDuration(sourcePath)

    progress(20, 'Transcribing audio')
    const chunks = await splitAudioIntoChunks(audioPath)
    const transcript = await transcribeChunks(chunks, progress)

    progress(80, 'Scoring keyword density')
    const catalog = await loadKeywordCatalog()
    const analysis = speechTimeline(
      transcript.words,
      catalog,
      this.intervalSeconds,
      Math.max(durationSeconds, transcript.duration),
    )
    analysis.summary.language = transcript.language

    progress(90, 'Speech timeline ready')
    logger.info(`[SpeechAnalyzer] ${transcript.words.length} words over ${analysis.timeline.length} intervals`)
    return analysis
  }

  async cleanup(): Promise<void> {
    if (!this.tempDir) return
    const dir = this.tempDir
    this.tempDir = null
    await removeDirectory(dir, { recursive: true, force: true })
  }
}
