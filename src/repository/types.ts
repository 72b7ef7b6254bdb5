/**
 * Repository Types
 * Snapshot, tree and node shapes plus the interface the browser reads through
 */

export type TreeId = string
export type BlobId = string

export interface NodeMeta {
  size?: number
  uid?: number
  gid?: number
  user?: string
  group?: string
  mtime?: Date
  // permission bits only, the file type lives on the node
  mode?: number
}

interface NodeBase {
  name: string
  meta: NodeMeta
}

export interface FileNode extends NodeBase {
  type: 'file'
  content: BlobId[]
}

export interface DirNode extends NodeBase {
  type: 'dir'
  subtree: TreeId
}

export interface SymlinkNode extends NodeBase {
  type: 'symlink'
  linktarget: string
}

export interface SpecialNode extends NodeBase {
  type: 'dev' | 'chardev' | 'fifo' | 'socket'
}

export type Node = FileNode | DirNode | SymlinkNode | SpecialNode
export type NodeType = Node['type']

export interface Tree {
  nodes: Node[]
}

export interface Snapshot {
  id: string
  time: Date
  hostname?: string
  paths: string[]
  tree: TreeId
}

export interface OpenFile {
  size: number
  readAt(offset: number, length: number): Promise<Uint8Array>
}

export interface Progress {
  inc(n: number): void
  finish(): void
}

export interface ProgressBars {
  progressCounter(prefix: string): Progress
}

export interface Repository {
  getTree(id: TreeId): Promise<Tree>
  openFile(node: FileNode): Promise<OpenFile>
  /** Cold repositories only support full restores, not reading single files */
  isCold(): boolean
  progressBars(): ProgressBars
  listSnapshots(): Promise<Snapshot[]>
  getSnapshot(id: string): Promise<Snapshot>
}

export function isDir(node: Node): node is DirNode {
  return node.type === 'dir'
}

export function isFile(node: Node): node is FileNode {
  return node.type === 'file'
}

export function shortId(id: string): string {
  return id.slice(0, 8)
}
