import { SnapshotNotFoundError } from './errors.js'
import type { Node, Repository, Snapshot, TreeId } from './types.js'

/**
 * Find a snapshot by full id, unique id prefix, or "latest"
 */
export async function resolveSnapshot(repo: Repository, query: string): Promise<Snapshot> {
  const snapshots = await repo.listSnapshots()

  if (query === 'latest') {
    const latest = snapshots[snapshots.length - 1]
    if (!latest) throw new SnapshotNotFoundError(query, 'repository has no snapshots')
    return latest
  }

  const exact = snapshots.find((snapshot) => snapshot.id === query)
  if (exact) return exact

  const matches = query === '' ? [] : snapshots.filter((snapshot) => snapshot.id.startsWith(query))
  if (matches.length > 1) {
    throw new SnapshotNotFoundError(query, `snapshot prefix "${query}" is ambiguous (${matches.length} matches)`)
  }
  const [match] = matches
  if (!match) throw new SnapshotNotFoundError(query)
  return match
}

export interface TreeEntry {
  path: string
  node: Node
}

/**
 * Depth-first walk over every node below `treeId`, parents before children
 */
export async function* walkTree(repo: Repository, treeId: TreeId, prefix = ''): AsyncGenerator<TreeEntry> {
  const tree = await repo.getTree(treeId)
  for (const node of tree.nodes) {
    const nodePath = prefix === '' ? node.name : `${prefix}/${node.name}`
    yield { path: nodePath, node }
    if (node.type === 'dir') {
      yield* walkTree(repo, node.subtree, nodePath)
    }
  }
}
