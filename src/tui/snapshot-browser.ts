/**
 * Snapshot browser screen
 *
 * Owns the directory being shown, the stack of parent directories, the
 * summary cache and the active mode. Every key goes through input(), which
 * hands it to exactly one mode.
 */

import * as path from 'node:path'
import type { Node, Repository, Snapshot, Tree, TreeId } from '../repository/types.js'
import { shortId } from '../repository/types.js'
import { Summary } from '../summary/summary.js'
import { SummaryMap } from '../summary/summary-map.js'
import { createDebugLogger } from '../utils/debug.js'
import { RestoreFlow } from './restore-flow.js'
import type { KeyEvent } from './types.js'
import { formatBytes, formatMtime, modeString, countLines } from './utils/format.js'
import {
  popupPrompt,
  popupScrollableText,
  popupText,
  type PopupPrompt,
  type PopupScrollableText,
  type PopupText,
} from './widgets/popup.js'
import { SelectTable, type Row } from './widgets/select-table.js'

const log = createDebugLogger('SnapshotBrowser')

export const INFO_TEXT =
  '(Esc) quit | (Enter) enter dir | (Backspace) return to parent | (v) view | (r) restore | (?) show all commands'

export const HELP_TEXT = `
Ls Commands:

          v : view file contents (text files only, up to 1MiB)
          r : restore selected item
          n : toggle numeric IDs
          s : compute information for (sub)-dirs

General Commands:

      q,Esc : exit
      Enter : enter dir
  Backspace : return to parent dir
          ? : show this help page
`

export const TABLE_HEADER: Row = ['Name', 'Size', 'Mode', 'User', 'Group', 'Time']

export const DEFAULT_VIEW_LIMIT = 1_000_000
const MAX_VIEW_HEIGHT = 40
const HELP_CLOSE_KEYS = new Set(['q', 'space', '?', 'escape', 'return'])

export type BrowserScreen =
  | { kind: 'browsing' }
  | { kind: 'help'; popup: PopupText }
  | { kind: 'restore'; restore: RestoreFlow }
  | { kind: 'prompt-exit'; prompt: PopupPrompt }
  | { kind: 'show-file'; popup: PopupScrollableText }

export type BrowserMode = BrowserScreen['kind']

export type BrowserResult =
  | { type: 'exit' }
  | { type: 'return'; summaryMap: SummaryMap }
  | { type: 'none' }

interface NavigationFrame {
  tree: Tree
  treeId: TreeId
  selected: number
}

export interface SnapshotBrowserOptions {
  numeric?: boolean
  /** Most bytes read when viewing a file */
  viewLimit?: number
  /** Directory relative restore targets are resolved against */
  cwd?: string
  appName?: string
}

const BROWSING: BrowserScreen = { kind: 'browsing' }
const NONE: BrowserResult = { type: 'none' }

export class SnapshotBrowser {
  readonly table = new SelectTable(TABLE_HEADER)
  private screen: BrowserScreen = BROWSING
  private numeric: boolean
  private readonly path: string[] = []
  private readonly trees: NavigationFrame[] = []
  private titleText = ''
  private footerText = ''
  private readonly viewLimit: number

  private constructor(
    private readonly repo: Repository,
    readonly snapshot: Snapshot,
    private tree: Tree,
    private treeId: TreeId,
    private readonly summaryMap: SummaryMap,
    private readonly options: SnapshotBrowserOptions
  ) {
    this.numeric = options.numeric ?? false
    this.viewLimit = options.viewLimit ?? DEFAULT_VIEW_LIMIT
    this.updateTable()
  }

  static async create(
    repo: Repository,
    snapshot: Snapshot,
    summaryMap: SummaryMap = new SummaryMap(),
    options: SnapshotBrowserOptions = {}
  ): Promise<SnapshotBrowser> {
    const tree = await repo.getTree(snapshot.tree)
    return new SnapshotBrowser(repo, snapshot, tree, snapshot.tree, summaryMap, options)
  }

  get mode(): BrowserMode {
    return this.screen.kind
  }

  get currentScreen(): BrowserScreen {
    return this.screen
  }

  get currentTree(): Tree {
    return this.tree
  }

  get currentTreeId(): TreeId {
    return this.treeId
  }

  get currentPath(): readonly string[] {
    return this.path
  }

  get depth(): number {
    return this.trees.length
  }

  get isNumeric(): boolean {
    return this.numeric
  }

  get summaries(): SummaryMap {
    return this.summaryMap
  }

  get title(): string {
    return this.titleText
  }

  get footer(): string {
    return this.footerText
  }

  selectedNode(): Node | undefined {
    const index = this.table.selected()
    return index === null ? undefined : this.tree.nodes[index]
  }

  lsRow(node: Node): Row {
    const meta = node.meta
    const [user, group] = this.numeric
      ? [meta.uid?.toString() ?? '?', meta.gid?.toString() ?? '?']
      : [meta.user ?? '?', meta.group ?? '?']
    return [
      node.name,
      formatBytes(meta.size ?? 0),
      modeString(node),
      user,
      group,
      formatMtime(meta.mtime),
    ]
  }

  updateTable(): void {
    const nodes = this.tree.nodes
    const oldSelection = nodes.length === 0 ? null : (this.table.selected() ?? 0)
    const summary = new Summary()
    const rows: Row[] = []

    for (const node of nodes) {
      let shown = node
      const cached = node.type === 'dir' ? this.summaryMap.get(node.subtree) : undefined
      if (cached) {
        summary.addDirectory(cached)
        shown = { ...node, meta: { ...node.meta, size: cached.size } }
      } else {
        summary.update(node)
      }
      rows.push(this.lsRow(shown))
    }

    this.table.setContent(rows)
    this.table.select(oldSelection)

    this.titleText = `${shortId(this.snapshot.id)}:/${this.path.join('/')}`
    this.footerText =
      `total: ${nodes.length}, files: ${summary.files}, dirs: ${summary.dirs}, ` +
      `size: ${formatBytes(summary.size)} - ${this.numeric ? 'numeric IDs' : 'Id names'}`
  }

  /** Descend into the selected directory */
  async enter(): Promise<void> {
    const index = this.table.selected()
    if (index === null) return
    const node = this.tree.nodes[index]
    if (!node || node.type !== 'dir') return

    // fetch first so a failure leaves the current directory untouched
    const child = await this.repo.getTree(node.subtree)
    this.trees.push({ tree: this.tree, treeId: this.treeId, selected: index })
    this.path.push(node.name)
    this.tree = child
    this.treeId = node.subtree
    this.table.setTo(0)
    this.updateTable()
    log.debug(`entered /${this.path.join('/')}`)
  }

  /** Ascend to the parent directory; true when already at the root */
  goBack(): boolean {
    this.path.pop()
    const frame = this.trees.pop()
    if (!frame) return true
    this.tree = frame.tree
    this.treeId = frame.treeId
    this.table.setTo(frame.selected)
    this.updateTable()
    return false
  }

  toggleNumeric(): void {
    this.numeric = !this.numeric
    this.updateTable()
  }

  async computeSizes(): Promise<void> {
    const progress = this.repo.progressBars().progressCounter('computing (sub)-dir information')
    try {
      await this.summaryMap.compute(this.repo, this.treeId, progress)
    } finally {
      progress.finish()
    }
    this.updateTable()
  }

  async viewFile(): Promise<void> {
    // viewing is not supported on cold repositories
    if (this.repo.isCold()) return
    const node = this.selectedNode()
    if (!node || node.type !== 'file') return

    const file = await this.repo.openFile(node)
    const length = Math.min(node.meta.size ?? file.size, this.viewLimit)
    let data: Uint8Array
    try {
      data = await file.readAt(0, length)
    } catch (error) {
      log.debug(`cannot read ${node.name}`, { error: String(error) })
      return
    }

    // viewing is only supported for text files
    let content: string
    try {
      content = new TextDecoder('utf-8', { fatal: true }).decode(data)
    } catch {
      log.debug(`${node.name} is not valid UTF-8`)
      return
    }

    const lines = countLines(content)
    const filePath = [...this.path, node.name].join('/')
    this.screen = {
      kind: 'show-file',
      popup: popupScrollableText(
        `${shortId(this.snapshot.id)}:/${filePath}`,
        content,
        Math.min(lines + 1, MAX_VIEW_HEIGHT)
      ),
    }
  }

  openRestore(): void {
    const node = this.selectedNode()
    if (!node) return
    const isAbsolute = this.snapshot.paths.some((p) => path.isAbsolute(p))
    const nodePath = [...this.path, node.name].join('/')
    const defaultTarget = isAbsolute ? `/${nodePath}` : nodePath
    const restore = new RestoreFlow(
      this.repo,
      node,
      `${shortId(this.snapshot.id)}:/${nodePath}`,
      defaultTarget,
      { cwd: this.options.cwd }
    )
    this.screen = { kind: 'restore', restore }
  }

  async input(key: KeyEvent): Promise<BrowserResult> {
    const screen = this.screen
    switch (screen.kind) {
      case 'browsing':
        return this.inputBrowsing(key)

      case 'show-file':
        if (screen.popup.input(key).type !== 'none') {
          this.screen = BROWSING
        }
        return NONE

      case 'help':
        if (HELP_CLOSE_KEYS.has(key.name)) {
          this.screen = BROWSING
        }
        return NONE

      case 'restore':
        if (await screen.restore.input(key)) {
          this.screen = BROWSING
        }
        return NONE

      case 'prompt-exit': {
        const answer = screen.prompt.input(key)
        if (answer === 'ok') return { type: 'exit' }
        if (answer === 'cancel') this.screen = BROWSING
        return NONE
      }
    }
  }

  private async inputBrowsing(key: KeyEvent): Promise<BrowserResult> {
    if (key.ctrl) return NONE
    switch (key.name) {
      case 'return':
      case 'right':
        await this.enter()
        break
      case 'backspace':
      case 'left':
        if (this.goBack()) {
          return { type: 'return', summaryMap: this.summaryMap }
        }
        break
      case 'escape':
      case 'q':
        this.screen = {
          kind: 'prompt-exit',
          prompt: popupPrompt(`exit ${this.options.appName ?? 'snaptree'}`, 'do you want to exit? (y/n)'),
        }
        break
      case '?':
        this.screen = { kind: 'help', popup: popupText('help', HELP_TEXT) }
        break
      case 'n':
        this.toggleNumeric()
        break
      case 's':
        await this.computeSizes()
        break
      case 'v':
        await this.viewFile()
        break
      case 'r':
        this.openRestore()
        break
      default:
        this.table.input(key)
    }
    return NONE
  }
}
