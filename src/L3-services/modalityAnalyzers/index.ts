import { AudioAnalyzer } from './audioAnalyzer.js'
import { VisualAnalyzer } from './visualAnalyzer.js'
import { SpeechAnalyzer } from './speechAnalyzer.js'
import type { AnalyzerFactories } from './types.js'

export { AudioAnalyzer, VisualAnalyzer, SpeechAnalyzer }
export type { AnalyzerFactories, AnalyzerFactory, AnalyzerProgress, ModalityAnalyzer } from './types.js'

/** FFmpeg-based audio/visual analyzers and the Whisper-based speech analyzer. */
export const defaultAnalyzers: AnalyzerFactories = {
  audio: intervalSeconds => new AudioAnalyzer(intervalSeconds),
  visual: intervalSeconds => new VisualAnalyzer(intervalSeconds),
  speech: intervalSeconds => new SpeechAnalyzer(intervalSeconds),
}
