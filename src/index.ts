export * from './types/index.js'

export { normalize, NO_INFORMATION } from './L0-pure/engagement/normalization.js'
export {
  combine,
  generateCandidates,
  scorePerModality,
  applySeparationPenalty,
  applyDistributionBonus,
  selectTopSegments,
  segmentDistance,
  getBestSegments,
  DISTRIBUTION_BUCKETS,
} from './L0-pure/engagement/segments.js'
export type { ModalityTimelines, BestSegmentsRequest } from './L0-pure/engagement/segments.js'
export { summarizeSegments } from './L0-pure/engagement/summary.js'
export { runSettled } from './L0-pure/concurrency/runSettled.js'

export { initConfig, getConfig } from './L1-infra/config/environment.js'
export type { AppEnvironment, CLIOptions } from './L1-infra/config/environment.js'
export { loadEngagementConfig, parseEngagementConfig } from './L1-infra/config/engagementConfig.js'

export { AnalysisCache } from './L3-services/analysisCache/analysisCache.js'
export type { CacheStats } from './L3-services/analysisCache/analysisCache.js'
export { AnalysisOrchestrator, resolveOrchestratorOptions } from './L3-services/analysisOrchestrator/analysisOrchestrator.js'
export { ProgressTracker } from './L3-services/analysisOrchestrator/progressTracker.js'
export { EngagementScorer } from './L3-services/engagementScorer/engagementScorer.js'
export type { EngagementExport } from './L3-services/engagementScorer/engagementScorer.js'
export { AudioAnalyzer, VisualAnalyzer, SpeechAnalyzer, defaultAnalyzers } from './L3-services/modalityAnalyzers/index.js'
export type {
  AnalyzerFactories,
  AnalyzerFactory,
  AnalyzerProgress,
  ModalityAnalyzer,
} from './L3-services/modalityAnalyzers/index.js'

export { analyzeVideoComplete, findBestSegments, estimateTotalDuration } from './L6-pipeline/pipeline.js'
export type { AnalyzeVideoOptions } from './L6-pipeline/pipeline.js'
