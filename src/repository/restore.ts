import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { createDebugLogger } from '../utils/debug.js'
import type { FileNode, Node, Progress, Repository } from './types.js'

const log = createDebugLogger('Restore')

const READ_CHUNK = 1024 * 1024

export interface RestoreStats {
  files: number
  dirs: number
  symlinks: number
  skipped: number
  bytes: number
}

function emptyStats(): RestoreStats {
  return { files: 0, dirs: 0, symlinks: 0, skipped: 0, bytes: 0 }
}

function isSafeName(name: string): boolean {
  return name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\0')
}

async function restoreFile(repo: Repository, node: FileNode, target: string, stats: RestoreStats): Promise<void> {
  const file = await repo.openFile(node)
  const handle = await fs.open(target, 'w')
  try {
    for (let offset = 0; offset < file.size; offset += READ_CHUNK) {
      const data = await file.readAt(offset, READ_CHUNK)
      await handle.write(data)
      stats.bytes += data.length
    }
  } finally {
    await handle.close()
  }
  stats.files += 1
}

async function applyMeta(node: Node, target: string): Promise<void> {
  if (node.meta.mode !== undefined) {
    await fs.chmod(target, node.meta.mode & 0o7777)
  }
  if (node.meta.mtime) {
    await fs.utimes(target, node.meta.mtime, node.meta.mtime)
  }
}

async function restoreInto(
  repo: Repository,
  node: Node,
  target: string,
  progress: Progress,
  stats: RestoreStats
): Promise<void> {
  progress.inc(1)
  switch (node.type) {
    case 'dir': {
      await fs.mkdir(target, { recursive: true })
      const tree = await repo.getTree(node.subtree)
      for (const child of tree.nodes) {
        if (!isSafeName(child.name)) {
          log.warn(`skipping entry with unsafe name ${JSON.stringify(child.name)}`)
          stats.skipped += 1
          continue
        }
        await restoreInto(repo, child, path.join(target, child.name), progress, stats)
      }
      stats.dirs += 1
      await applyMeta(node, target)
      return
    }
    case 'file':
      await restoreFile(repo, node, target, stats)
      await applyMeta(node, target)
      return
    case 'symlink':
      await fs.symlink(node.linktarget, target)
      stats.symlinks += 1
      return
    default:
      log.debug(`skipping ${node.type} ${target}`)
      stats.skipped += 1
  }
}

/**
 * Write `node` (and everything below it) to `target`
 */
export async function restoreNode(
  repo: Repository,
  node: Node,
  target: string,
  progress: Progress
): Promise<RestoreStats> {
  const stats = emptyStats()
  await fs.mkdir(path.dirname(target), { recursive: true })
  await restoreInto(repo, node, target, progress, stats)
  progress.finish()
  return stats
}
