import { TreeNotFoundError } from '../repository/errors.js'
import { CallbackProgressBars, type ProgressUpdate } from '../repository/progress.js'
import type {
  DirNode,
  FileNode,
  Node,
  NodeMeta,
  OpenFile,
  ProgressBars,
  Repository,
  Snapshot,
  SymlinkNode,
  Tree,
  TreeId,
} from '../repository/types.js'

// 64 hex chars; the first 8 (the short id) count up
function fakeId(fill: string, n: number): string {
  return n.toString(16).padStart(8, '0') + fill.repeat(56)
}

/**
 * In-memory repository for tests. Records every tree fetch and every
 * readAt length, and can be switched to cold or made to fail.
 */
export class MemoryRepository implements Repository {
  readonly trees = new Map<TreeId, Tree>()
  readonly blobs = new Map<string, Uint8Array>()
  readonly snapshots: Snapshot[] = []
  readonly fetched: TreeId[] = []
  readonly reads: number[] = []
  readonly progressUpdates: ProgressUpdate[] = []
  readonly failingTrees = new Set<TreeId>()
  cold = false
  failReads = false
  failOpen = false
  private counter = 0
  /** Replace to route progress elsewhere; records into progressUpdates by default */
  bars: ProgressBars = new CallbackProgressBars((update) => {
    this.progressUpdates.push(update)
  })

  addTree(nodes: Node[]): TreeId {
    const id = fakeId('a', ++this.counter)
    this.trees.set(id, { nodes })
    return id
  }

  file(name: string, content: string | Uint8Array = '', meta: NodeMeta = {}): FileNode {
    const data = typeof content === 'string' ? new TextEncoder().encode(content) : content
    const blobId = fakeId('b', ++this.counter)
    this.blobs.set(blobId, data)
    return { name, type: 'file', content: [blobId], meta: { size: data.length, ...meta } }
  }

  dir(name: string, nodes: Node[], meta: NodeMeta = {}): DirNode {
    return { name, type: 'dir', subtree: this.addTree(nodes), meta }
  }

  symlink(name: string, linktarget: string, meta: NodeMeta = {}): SymlinkNode {
    return { name, type: 'symlink', linktarget, meta }
  }

  addSnapshot(nodes: Node[], options: { paths?: string[]; time?: Date; hostname?: string } = {}): Snapshot {
    const snapshot: Snapshot = {
      id: fakeId('5', ++this.counter),
      time: options.time ?? new Date(2024, 0, 1, 12, 0, 0),
      hostname: options.hostname ?? 'testhost',
      paths: options.paths ?? ['data'],
      tree: this.addTree(nodes),
    }
    this.snapshots.push(snapshot)
    return snapshot
  }

  async getTree(id: TreeId): Promise<Tree> {
    this.fetched.push(id)
    const tree = this.trees.get(id)
    if (!tree || this.failingTrees.has(id)) throw new TreeNotFoundError(id)
    return tree
  }

  async openFile(node: FileNode): Promise<OpenFile> {
    if (this.failOpen) throw new Error(`cannot open ${node.name}`)
    const parts = node.content.map((id) => this.blobs.get(id) ?? new Uint8Array())
    const data = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0))
    let offset = 0
    for (const part of parts) {
      data.set(part, offset)
      offset += part.length
    }
    return {
      size: data.length,
      readAt: async (start: number, length: number) => {
        this.reads.push(length)
        if (this.failReads) throw new Error(`cannot read ${node.name}`)
        return data.subarray(start, start + length)
      },
    }
  }

  isCold(): boolean {
    return this.cold
  }

  progressBars(): ProgressBars {
    return this.bars
  }

  async listSnapshots(): Promise<Snapshot[]> {
    return [...this.snapshots]
  }

  async getSnapshot(id: string): Promise<Snapshot> {
    const snapshot = this.snapshots.find((s) => s.id === id)
    if (!snapshot) throw new Error(`no snapshot ${id}`)
    return snapshot
  }
}

/**
 * Root {A: 10 bytes, B: 20 bytes, C/{D: 5 bytes}}
 */
export function createSampleRepository(): { repo: MemoryRepository; snapshot: Snapshot } {
  const repo = new MemoryRepository()
  const snapshot = repo.addSnapshot([
    repo.file('A', 'a'.repeat(10), { uid: 1000, gid: 100, user: 'alice', group: 'users', mode: 0o644 }),
    repo.file('B', 'b'.repeat(20), { uid: 1000, gid: 100, user: 'alice', group: 'users', mode: 0o600 }),
    repo.dir('C', [repo.file('D', 'd'.repeat(5))], { uid: 0, gid: 0, user: 'root', group: 'root', mode: 0o755 }),
  ])
  return { repo, snapshot }
}

export function waitForEffects(ms: number = 10): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
