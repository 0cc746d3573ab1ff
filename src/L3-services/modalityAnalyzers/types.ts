import type { Modality, ModalityAnalysis } from '../../types/index.js'

/** Milestone reporter handed to an analyzer for one run. */
export type AnalyzerProgress = (percent: number, status: string) => void

/**
 * Produces one modality's timeline for a source video.
 *
 * An instance serves a single run: the orchestrator creates it, calls
 * `produceTimeline` once, then always calls `cleanup` — whether the run
 * succeeded or not.
 */
export interface ModalityAnalyzer {
  readonly modality: Modality
  produceTimeline(sourcePath: string, progress: AnalyzerProgress): Promise<ModalityAnalysis>
  cleanup(): Promise<void>
}

export type AnalyzerFactory = (intervalSeconds: number) => ModalityAnalyzer

export type AnalyzerFactories = Record<Modality, AnalyzerFactory>
