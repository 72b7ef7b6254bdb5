import ora, { type Ora } from 'ora'
import type { Progress, ProgressBars } from './types.js'

export interface ProgressUpdate {
  prefix: string
  count: number
  finished: boolean
}

class NoProgress implements Progress {
  inc(_n: number): void {}
  finish(): void {}
}

export class NoProgressBars implements ProgressBars {
  progressCounter(_prefix: string): Progress {
    return new NoProgress()
  }
}

/**
 * Reports counter changes to a callback, used by the TUI status line
 */
export class CallbackProgressBars implements ProgressBars {
  constructor(private readonly onUpdate: (update: ProgressUpdate) => void) {}

  progressCounter(prefix: string): Progress {
    let count = 0
    const onUpdate = this.onUpdate
    onUpdate({ prefix, count, finished: false })
    return {
      inc(n: number) {
        count += n
        onUpdate({ prefix, count, finished: false })
      },
      finish() {
        onUpdate({ prefix, count, finished: true })
      },
    }
  }
}

class SpinnerProgress implements Progress {
  private count = 0

  constructor(private readonly prefix: string, private readonly spinner: Ora) {}

  inc(n: number): void {
    this.count += n
    this.spinner.text = `${this.prefix} (${this.count})`
  }

  finish(): void {
    this.spinner.succeed(`${this.prefix} (${this.count})`)
  }
}

export class OraProgressBars implements ProgressBars {
  progressCounter(prefix: string): Progress {
    const spinner = ora({ text: prefix, stream: process.stderr }).start()
    return new SpinnerProgress(prefix, spinner)
  }
}
