import logger from '../../L1-infra/logger/configLogger.js'
import type { Modality, ProgressCallback, ProgressEvent, ProgressSnapshot } from '../../types/index.js'

/**
 * Latest progress event per modality for one orchestrator.
 *
 * All writes go through `update`, which runs on the event loop, so the
 * snapshot never sees interleaved partial writes. Readers receive frozen
 * copies.
 */
export class ProgressTracker {
  private readonly latest = new Map<Modality, ProgressEvent>()

  constructor(private readonly onProgress?: ProgressCallback) {}

  update(modality: Modality, percent: number, statusMessage: string): ProgressEvent {
    const event: ProgressEvent = {
      modality,
      percent,
      statusMessage,
      timestamp: new Date().toISOString(),
    }
    this.latest.set(modality, event)

    if (this.onProgress) {
      try {
        this.onProgress(modality, percent, statusMessage)
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        logger.warn(`[Progress] Callback failed for ${modality}: ${message}`)
      }
    }
    return event
  }

  snapshot(): ProgressSnapshot {
    const copy: Partial<Record<Modality, ProgressEvent>> = {}
    for (const [modality, event] of this.latest) {
      copy[modality] = Object.freeze({ ...event })
    }
    return Object.freeze(copy)
  }

  reset(): void {
    this.latest.clear()
  }
}
