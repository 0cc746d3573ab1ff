import { fileExistsSync, readTextFileSync } from '../fileSystem/fileSystem.js'
import { getConfig } from './environment.js'
import logger from '../logger/configLogger.js'
import { DEFAULT_ENGAGEMENT_CONFIG, NORMALIZATION_METHODS } from '../../types/index.js'
import type { EngagementConfig, ModalityWeights, NormalizationMethod } from '../../types/index.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNormalizationMethod(value: unknown): value is NormalizationMethod {
  return NORMALIZATION_METHODS.some(m => m === value)
}

/** Read a non-negative number field, warning and falling back when invalid. */
function numberField(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  path: string,
): number {
  const value = source[key]
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    logger.warn(`engagement.json: invalid "${path}" (${String(value)}) — using default ${fallback}`)
    return fallback
  }
  return value
}

function parseWeights(raw: unknown): ModalityWeights {
  const defaults = DEFAULT_ENGAGEMENT_CONFIG.weights
  if (raw === undefined) return { ...defaults }
  if (!isRecord(raw)) {
    logger.warn('engagement.json: "weights" must be an object — using defaults')
    return { ...defaults }
  }
  const weights: ModalityWeights = {
    audio: numberField(raw, 'audio', defaults.audio, 'weights.audio'),
    visual: numberField(raw, 'visual', defaults.visual, 'weights.visual'),
    speech: numberField(raw, 'speech', defaults.speech, 'weights.speech'),
  }
  const total = weights.audio + weights.visual + weights.speech
  if (Math.abs(total - 1) > 1e-6) {
    logger.warn(`engagement.json: weights sum to ${total.toFixed(3)}, not 1 — combined scores will not span [0, 1]`)
  }
  return weights
}

/**
 * Merge a parsed engagement.json over the defaults. Invalid fields are
 * reported and replaced by their default; unknown fields are ignored.
 */
export function parseEngagementConfig(raw: unknown): EngagementConfig {
  const defaults = DEFAULT_ENGAGEMENT_CONFIG
  if (!isRecord(raw)) {
    logger.warn('engagement.json: expected a JSON object — using defaults')
    return { ...defaults, weights: { ...defaults.weights } }
  }

  let normalizationMethod = defaults.normalizationMethod
  if (raw.normalizationMethod !== undefined) {
    if (isNormalizationMethod(raw.normalizationMethod)) {
      normalizationMethod = raw.normalizationMethod
    } else {
      logger.warn(`engagement.json: unknown normalizationMethod "${String(raw.normalizationMethod)}" — using ${defaults.normalizationMethod}`)
    }
  }

  let segmentDurationSeconds = numberField(raw, 'segmentDurationSeconds', defaults.segmentDurationSeconds, 'segmentDurationSeconds')
  if (segmentDurationSeconds === 0) {
    logger.warn('engagement.json: "segmentDurationSeconds" must be positive — using default')
    segmentDurationSeconds = defaults.segmentDurationSeconds
  }

  return {
    weights: parseWeights(raw.weights),
    segmentDurationSeconds,
    minSeparationSeconds: numberField(raw, 'minSeparationSeconds', defaults.minSeparationSeconds, 'minSeparationSeconds'),
    overlapPenaltyFactor: numberField(raw, 'overlapPenaltyFactor', defaults.overlapPenaltyFactor, 'overlapPenaltyFactor'),
    distributionBonus: numberField(raw, 'distributionBonus', defaults.distributionBonus, 'distributionBonus'),
    normalizationMethod,
  }
}

/** Load engagement scoring settings from ENGAGEMENT_CONFIG_PATH, or the defaults when absent. */
export function loadEngagementConfig(configPath: string = getConfig().ENGAGEMENT_CONFIG_PATH): EngagementConfig {
  if (!fileExistsSync(configPath)) {
    logger.debug(`engagement.json not found at ${configPath} — using defaults`)
    return parseEngagementConfig({})
  }

  const raw = readTextFileSync(configPath)
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Failed to parse engagement config at ${configPath}: ${message}`)
  }
  const config = parseEngagementConfig(parsed)
  logger.info(`Engagement config loaded: ${configPath} (normalization=${config.normalizationMethod})`)
  return config
}
