import * as path from 'node:path'
import { restoreNode, type RestoreStats } from '../repository/restore.js'
import type { Node, Repository } from '../repository/types.js'
import { createDebugLogger } from '../utils/debug.js'
import type { KeyEvent } from './types.js'
import { TextInput } from './widgets/text-input.js'

const log = createDebugLogger('RestoreFlow')

export type RestoreStage =
  | { kind: 'target' }
  | { kind: 'confirm'; destination: string }
  | { kind: 'restoring'; destination: string }
  | { kind: 'done'; destination: string; stats: RestoreStats }
  | { kind: 'failed'; destination: string; message: string }

export interface RestoreFlowOptions {
  /** Directory relative destinations are resolved against */
  cwd?: string
}

/**
 * Restore of one snapshot entry: pick a destination, confirm, write, report.
 * input() resolves to true once the flow is finished.
 */
export class RestoreFlow {
  readonly target: TextInput
  private current: RestoreStage = { kind: 'target' }
  private readonly cwd: string

  constructor(
    private readonly repo: Repository,
    readonly node: Node,
    readonly label: string,
    readonly defaultTarget: string,
    options: RestoreFlowOptions = {}
  ) {
    this.target = new TextInput(defaultTarget)
    this.cwd = options.cwd ?? process.cwd()
  }

  get stage(): RestoreStage {
    return this.current
  }

  async input(key: KeyEvent): Promise<boolean> {
    const stage = this.current
    switch (stage.kind) {
      case 'target':
        if (key.name === 'escape') return true
        if (key.name === 'return') {
          const value = this.target.value.trim()
          if (value !== '') {
            this.current = { kind: 'confirm', destination: path.resolve(this.cwd, value) }
          }
          return false
        }
        this.target.input(key)
        return false

      case 'confirm':
        if (key.ctrl) return false
        if (key.name === 'y' || key.name === 'Y' || key.name === 'return') {
          await this.run(stage.destination)
        } else if (key.name === 'n' || key.name === 'N' || key.name === 'escape') {
          this.current = { kind: 'target' }
        }
        return false

      case 'restoring':
        return false

      case 'done':
      case 'failed':
        return true
    }
  }

  private async run(destination: string): Promise<void> {
    this.current = { kind: 'restoring', destination }
    const progress = this.repo.progressBars().progressCounter(`restoring ${this.label}`)
    try {
      const stats = await restoreNode(this.repo, this.node, destination, progress)
      log.info(`restored ${this.label} to ${destination}`, stats)
      this.current = { kind: 'done', destination, stats }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log.error(`restore of ${this.label} to ${destination} failed`, { message })
      progress.finish()
      this.current = { kind: 'failed', destination, message }
    }
  }
}
