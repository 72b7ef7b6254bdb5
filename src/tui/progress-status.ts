import { CallbackProgressBars, type ProgressUpdate } from '../repository/progress.js'

/**
 * Latest progress counter state, readable from React through
 * useSyncExternalStore
 */
export class ProgressStatus {
  readonly bars: CallbackProgressBars
  private current: ProgressUpdate | null = null
  private readonly listeners = new Set<() => void>()

  constructor() {
    this.bars = new CallbackProgressBars((update) => {
      this.current = update
      for (const listener of this.listeners) listener()
    })
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  snapshot = (): ProgressUpdate | null => this.current
}

export function formatProgress(update: ProgressUpdate | null): string | null {
  if (!update) return null
  return update.finished
    ? `${update.prefix}: ${update.count} done`
    : `${update.prefix}: ${update.count}`
}
