/**
 * Capture local directories into a FsRepository as a new snapshot.
 *
 * Source paths are stored below their full absolute path, so a snapshot of
 * /home/ada/docs has the root entries home -> ada -> docs.
 */

import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { createDebugLogger } from '../utils/debug.js'
import { RepositoryError } from './errors.js'
import type { FsRepository } from './fs-repository.js'
import type { Node, NodeMeta, Progress, Snapshot, Tree } from './types.js'

const log = createDebugLogger('Capture')

export const CHUNK_SIZE = 1024 * 1024

export interface CaptureOptions {
  hostname?: string
  time?: Date
  progress?: Progress
}

interface PendingDir {
  meta: NodeMeta
  children: Map<string, PendingEntry>
}

type PendingEntry = { kind: 'node'; node: Node } | { kind: 'dir'; dir: PendingDir }

let currentUser: { uid: number; username: string } | null | undefined

// os.userInfo() throws when the uid has no passwd entry
function lookupCurrentUser(): { uid: number; username: string } | null {
  if (currentUser !== undefined) return currentUser
  try {
    const info = os.userInfo()
    currentUser = { uid: info.uid, username: info.username }
  } catch (error) {
    log.debug('no user name for the current uid', { error: String(error) })
    currentUser = null
  }
  return currentUser
}

function metaFromStats(stats: Stats, withSize: boolean): NodeMeta {
  const current = lookupCurrentUser()
  const meta: NodeMeta = {
    uid: stats.uid,
    gid: stats.gid,
    mtime: stats.mtime,
    mode: stats.mode & 0o7777,
  }
  if (withSize) meta.size = stats.size
  if (current && stats.uid === current.uid) meta.user = current.username
  return meta
}

async function captureFile(repo: FsRepository, fullPath: string): Promise<string[]> {
  const content: string[] = []
  const handle = await fs.open(fullPath, 'r')
  try {
    const buffer = Buffer.alloc(CHUNK_SIZE)
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null)
      if (bytesRead === 0) break
      content.push(await repo.saveBlob(buffer.subarray(0, bytesRead)))
    }
  } finally {
    await handle.close()
  }
  return content
}

async function captureNode(repo: FsRepository, fullPath: string, name: string, progress: Progress | undefined): Promise<Node> {
  const stats = await fs.lstat(fullPath)
  progress?.inc(1)

  if (stats.isDirectory()) {
    const entries = (await fs.readdir(fullPath)).sort()
    const nodes: Node[] = []
    for (const entry of entries) {
      nodes.push(await captureNode(repo, path.join(fullPath, entry), entry, progress))
    }
    const subtree = await repo.saveTree({ nodes })
    return { name, type: 'dir', subtree, meta: metaFromStats(stats, false) }
  }
  if (stats.isFile()) {
    const content = await captureFile(repo, fullPath)
    return { name, type: 'file', content, meta: metaFromStats(stats, true) }
  }
  if (stats.isSymbolicLink()) {
    const linktarget = await fs.readlink(fullPath)
    return { name, type: 'symlink', linktarget, meta: metaFromStats(stats, true) }
  }

  const type = stats.isBlockDevice() ? 'dev'
    : stats.isCharacterDevice() ? 'chardev'
    : stats.isFIFO() ? 'fifo'
    : 'socket'
  return { name, type, meta: metaFromStats(stats, false) }
}

async function saveDir(repo: FsRepository, dir: PendingDir): Promise<Tree> {
  const nodes: Node[] = []
  const names = [...dir.children.keys()].sort()
  for (const name of names) {
    const entry = dir.children.get(name)
    if (!entry) continue
    if (entry.kind === 'node') {
      nodes.push(entry.node)
    } else {
      const subtree = await repo.saveTree(await saveDir(repo, entry.dir))
      nodes.push({ name, type: 'dir', subtree, meta: entry.dir.meta })
    }
  }
  return { nodes }
}

export async function captureSnapshot(
  repo: FsRepository,
  sources: string[],
  options: CaptureOptions = {}
): Promise<Snapshot> {
  if (sources.length === 0) {
    throw new RepositoryError('nothing to snapshot: no source paths given')
  }

  const root: PendingDir = { meta: {}, children: new Map() }
  const paths: string[] = []

  for (const source of sources) {
    const absolute = path.resolve(source)
    const parts = absolute.split(path.sep).filter((part) => part !== '')
    const name = parts.pop()
    if (name === undefined) {
      throw new RepositoryError(`cannot snapshot the file-system root: ${source}`)
    }

    let dir = root
    let ancestorPath = path.parse(absolute).root
    for (const part of parts) {
      ancestorPath = path.join(ancestorPath, part)
      const existing = dir.children.get(part)
      if (existing) {
        if (existing.kind === 'node') {
          throw new RepositoryError(`source paths overlap at ${ancestorPath}`)
        }
        dir = existing.dir
        continue
      }
      const next: PendingDir = { meta: metaFromStats(await fs.stat(ancestorPath), false), children: new Map() }
      dir.children.set(part, { kind: 'dir', dir: next })
      dir = next
    }

    if (dir.children.has(name)) {
      throw new RepositoryError(`source paths overlap at ${absolute}`)
    }
    log.debug(`capturing ${absolute}`)
    dir.children.set(name, { kind: 'node', node: await captureNode(repo, absolute, name, options.progress) })
    paths.push(absolute)
  }

  const tree = await repo.saveTree(await saveDir(repo, root))
  options.progress?.finish()

  return repo.saveSnapshot({
    time: options.time ?? new Date(),
    hostname: options.hostname ?? os.hostname(),
    paths,
    tree,
  })
}
