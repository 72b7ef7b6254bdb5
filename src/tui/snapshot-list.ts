/**
 * Snapshot list screen
 *
 * Hosts one SnapshotBrowser at a time and keeps the summary cache alive
 * between them, so sizes computed in one snapshot are reused in the next
 * whenever trees are shared.
 */

import type { Repository, Snapshot } from '../repository/types.js'
import { shortId } from '../repository/types.js'
import { SummaryMap } from '../summary/summary-map.js'
import { createDebugLogger } from '../utils/debug.js'
import { SnapshotBrowser, type SnapshotBrowserOptions } from './snapshot-browser.js'
import type { KeyEvent } from './types.js'
import { formatMtime } from './utils/format.js'
import { popupPrompt, type PopupPrompt } from './widgets/popup.js'
import { SelectTable, type Row } from './widgets/select-table.js'

const log = createDebugLogger('SnapshotList')

export const LIST_HEADER: Row = ['ID', 'Time', 'Host', 'Paths']

export const LIST_INFO_TEXT = '(Esc) quit | (Enter) browse snapshot'

export type ListScreen =
  | { kind: 'list' }
  | { kind: 'browser'; browser: SnapshotBrowser }
  | { kind: 'prompt-exit'; prompt: PopupPrompt }

export type ListResult = { type: 'exit' } | { type: 'none' }

export function snapshotRow(snapshot: Snapshot): Row {
  return [
    shortId(snapshot.id),
    formatMtime(snapshot.time),
    snapshot.hostname ?? '',
    snapshot.paths.join(','),
  ]
}

export class SnapshotList {
  readonly table = new SelectTable(LIST_HEADER)
  private screen: ListScreen = { kind: 'list' }
  private summaryMap: SummaryMap

  constructor(
    private readonly repo: Repository,
    readonly snapshots: Snapshot[],
    private readonly options: SnapshotBrowserOptions = {},
    summaryMap: SummaryMap = new SummaryMap()
  ) {
    this.summaryMap = summaryMap
    this.table.setContent(snapshots.map(snapshotRow))
    this.table.select(snapshots.length === 0 ? null : snapshots.length - 1)
  }

  static async create(repo: Repository, options: SnapshotBrowserOptions = {}): Promise<SnapshotList> {
    return new SnapshotList(repo, await repo.listSnapshots(), options)
  }

  get currentScreen(): ListScreen {
    return this.screen
  }

  get summaries(): SummaryMap {
    return this.summaryMap
  }

  get title(): string {
    return `snapshots (${this.snapshots.length})`
  }

  async open(snapshot: Snapshot): Promise<void> {
    const browser = await SnapshotBrowser.create(this.repo, snapshot, this.summaryMap, this.options)
    this.screen = { kind: 'browser', browser }
    log.debug(`browsing ${snapshot.id}`)
  }

  async input(key: KeyEvent): Promise<ListResult> {
    const screen = this.screen
    switch (screen.kind) {
      case 'browser': {
        const result = await screen.browser.input(key)
        if (result.type === 'exit') return result
        if (result.type === 'return') {
          this.summaryMap = result.summaryMap
          this.screen = { kind: 'list' }
        }
        return { type: 'none' }
      }

      case 'prompt-exit': {
        const answer = screen.prompt.input(key)
        if (answer === 'ok') return { type: 'exit' }
        if (answer === 'cancel') this.screen = { kind: 'list' }
        return { type: 'none' }
      }

      case 'list':
        switch (key.name) {
          case 'return':
          case 'right': {
            const index = this.table.selected()
            const snapshot = index === null ? undefined : this.snapshots[index]
            if (snapshot) await this.open(snapshot)
            break
          }
          case 'escape':
          case 'q':
            this.screen = {
              kind: 'prompt-exit',
              prompt: popupPrompt(`exit ${this.options.appName ?? 'snaptree'}`, 'do you want to exit? (y/n)'),
            }
            break
          default:
            this.table.input(key)
        }
        return { type: 'none' }
    }
  }
}
