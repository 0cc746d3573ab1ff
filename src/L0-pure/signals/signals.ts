import { clamp, maxOf, mean } from '../statistics/statistics.js'
import { bucketByInterval, intervalMeans } from '../timeline/timeline.js'
import type { TimedSample } from '../timeline/timeline.js'
import type { ModalityAnalysis } from '../../types/index.js'

// ── Audio ────────────────────────────────────────────────────────────────────

/** Loudness floor (LUFS) mapped to zero energy. */
export const LOUDNESS_FLOOR_LUFS = -70
/** Energy below which an interval counts as silent. */
export const SILENCE_ENERGY = 0.2
export const SCENE_CHANGE_THRESHOLD = 0.3

/** Map momentary loudness to [0, 1]; -inf and anything below the floor give 0. */
export function loudnessToEnergy(lufs: number): number {
  if (!Number.isFinite(lufs)) return 0
  return clamp((lufs - LOUDNESS_FLOOR_LUFS) / -LOUDNESS_FLOOR_LUFS, 0, 1)
}

/**
 * Audio timeline: `0.7 · energy + 0.3 · |Δenergy|` per interval, rewarding
 * loud passages and sudden changes in volume.
 */
export function audioTimeline(loudness: readonly TimedSample[], intervalSeconds: number): ModalityAnalysis {
  const energy = intervalMeans(
    loudness.map(s => ({ time: s.time, value: loudnessToEnergy(s.value) })),
    intervalSeconds,
  )
  const timeline = energy.map((e, i) => {
    const variation = i === 0 ? 0 : Math.abs(e - energy[i - 1])
    return 0.7 * e + 0.3 * variation
  })

  return {
    timeline,
    summary: {
      durationSeconds: energy.length * intervalSeconds,
      meanEnergy: mean(energy),
      peakEnergy: maxOf(energy),
      silentSeconds: energy.filter(e => e < SILENCE_ENERGY).length * intervalSeconds,
    },
  }
}

// ── Visual ───────────────────────────────────────────────────────────────────

/** Visual timeline: mean frame-to-frame scene score per interval. */
export function visualTimeline(sceneScores: readonly TimedSample[], intervalSeconds: number): ModalityAnalysis {
  const timeline = intervalMeans(sceneScores, intervalSeconds)
  return {
    timeline,
    summary: {
      durationSeconds: timeline.length * intervalSeconds,
      meanMotion: mean(timeline),
      peakMotion: maxOf(timeline),
      sceneChanges: sceneScores.filter(s => s.value > SCENE_CHANGE_THRESHOLD).length,
    },
  }
}

// ── Speech ───────────────────────────────────────────────────────────────────

export interface KeywordCategory {
  weight: number
  words: string[]
}

export type KeywordCatalog = Record<string, KeywordCategory>

export interface SpokenWord {
  word: string
  start: number
  end: number
}

/** Words per second treated as fully active speech. */
export const ACTIVE_SPEECH_RATE = 2.5

/** Lowercase and strip punctuation around a spoken token. */
export function normalizeToken(word: string): string {
  return word.toLowerCase().replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, '')
}

/** Build token → weight lookup. A word listed in several categories keeps its highest weight. */
export function keywordWeights(catalog: KeywordCatalog): Map<string, number> {
  const weights = new Map<string, number>()
  for (const category of Object.values(catalog)) {
    for (const word of category.words) {
      const token = normalizeToken(word)
      weights.set(token, Math.max(weights.get(token) ?? 0, category.weight))
    }
  }
  return weights
}

/**
 * Speech timeline: per interval, `0.4 · activity + 0.6 · keyword density`
 * where activity is the word rate relative to {@link ACTIVE_SPEECH_RATE} and
 * density is the weighted keyword hits per word, each capped at 1. Words are
 * placed at their midpoint. The timeline covers `durationSeconds` even when
 * the tail is silent.
 */
export function speechTimeline(
  words: readonly SpokenWord[],
  catalog: KeywordCatalog,
  intervalSeconds: number,
  durationSeconds: number,
): ModalityAnalysis {
  const weights = keywordWeights(catalog)
  const hits = new Map<string, number>()

  const samples = words.map(w => {
    const token = normalizeToken(w.word)
    const weight = weights.get(token) ?? 0
    if (weight > 0) hits.set(token, (hits.get(token) ?? 0) + 1)
    return { time: (w.start + w.end) / 2, value: weight }
  })

  const buckets = bucketByInterval(samples, intervalSeconds)
  const length = Math.max(buckets.length, Math.ceil(durationSeconds / intervalSeconds))
  const timeline: number[] = []
  for (let i = 0; i < length; i++) {
    const bucket = buckets[i] ?? []
    if (bucket.length === 0) {
      timeline.push(0)
      continue
    }
    const activity = Math.min(bucket.length / (ACTIVE_SPEECH_RATE * intervalSeconds), 1)
    const density = Math.min(bucket.reduce((sum, w) => sum + w, 0) / bucket.length, 1)
    timeline.push(0.4 * activity + 0.6 * density)
  }

  const topKeywords = [...hits.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, 5)
    .map(([keyword]) => keyword)

  return {
    timeline,
    summary: {
      durationSeconds: length * intervalSeconds,
      wordCount: words.length,
      keywordHits: [...hits.values()].reduce((sum, n) => sum + n, 0),
      topKeywords,
    },
  }
}
