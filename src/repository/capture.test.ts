/**
 * Tests for src/repository/capture.ts and src/repository/restore.ts
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import { captureSnapshot } from './capture.js'
import { initRepository, type FsRepository } from './fs-repository.js'
import { NoProgressBars } from './progress.js'
import { walkTree } from './resolve.js'
import { restoreNode } from './restore.js'
import type { Node } from './types.js'

describe('repository/capture', () => {
  let workDir: string
  let source: string
  let repo: FsRepository

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'snaptree-capture-'))
    source = path.join(workDir, 'src')
    await fs.mkdir(path.join(source, 'sub'), { recursive: true })
    await fs.writeFile(path.join(source, 'a.txt'), 'alpha')
    await fs.chmod(path.join(source, 'a.txt'), 0o640)
    await fs.writeFile(path.join(source, 'sub', 'b.txt'), 'beta')
    await fs.symlink('a.txt', path.join(source, 'link'))
    repo = await initRepository(path.join(workDir, 'repo'))
  })

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true })
  })

  // snapshot paths mirror the absolute source path without its leading slash
  const relative = (p: string) => p.split(path.sep).filter(Boolean).join('/')

  async function findNode(treeId: string, nodePath: string): Promise<Node> {
    for await (const entry of walkTree(repo, treeId)) {
      if (entry.path === nodePath) return entry.node
    }
    throw new Error(`${nodePath} not in snapshot`)
  }

  test('stores the source below its absolute path', async () => {
    const snapshot = await captureSnapshot(repo, [source], { hostname: 'testhost' })

    const paths: string[] = []
    for await (const entry of walkTree(repo, snapshot.tree)) {
      if (entry.path.startsWith(relative(source))) paths.push(entry.path)
    }

    const base = relative(source)
    expect(paths).toEqual([base, `${base}/a.txt`, `${base}/link`, `${base}/sub`, `${base}/sub/b.txt`])
    expect(snapshot.paths).toEqual([source])
    expect(snapshot.hostname).toBe('testhost')
    expect(await repo.getSnapshot(snapshot.id)).toEqual(snapshot)
  })

  test('records file metadata', async () => {
    const snapshot = await captureSnapshot(repo, [source])

    const file = await findNode(snapshot.tree, `${relative(source)}/a.txt`)
    expect(file.type).toBe('file')
    expect(file.meta.size).toBe(5)
    expect(file.meta.mode).toBe(0o640)

    const link = await findNode(snapshot.tree, `${relative(source)}/link`)
    expect(link).toMatchObject({ type: 'symlink', linktarget: 'a.txt' })
  })

  test('uses the given time', async () => {
    const time = new Date('2024-03-01T10:00:00.000Z')
    const snapshot = await captureSnapshot(repo, [source], { time })
    expect(snapshot.time).toEqual(time)
  })

  test('ticks progress once per captured entry', async () => {
    let count = 0
    let finished = false
    await captureSnapshot(repo, [source], {
      progress: { inc: (n) => { count += n }, finish: () => { finished = true } },
    })
    expect(count).toBe(5)
    expect(finished).toBe(true)
  })

  test('unchanged directories are stored once', async () => {
    const first = await captureSnapshot(repo, [source])
    const second = await captureSnapshot(repo, [source], { time: new Date(first.time.getTime() + 1000) })

    const before = await findNode(first.tree, relative(source))
    const after = await findNode(second.tree, relative(source))
    expect(before.type).toBe('dir')
    expect(after).toEqual(before)
    expect(second.id).not.toBe(first.id)
  })

  test('rejects overlapping sources', async () => {
    await expect(captureSnapshot(repo, [source, path.join(source, 'sub')]))
      .rejects.toThrow(`source paths overlap at ${source}`)
    await expect(captureSnapshot(repo, [source, source]))
      .rejects.toThrow(`source paths overlap at ${source}`)
  })

  test('rejects an empty source list', async () => {
    await expect(captureSnapshot(repo, [])).rejects.toThrow('nothing to snapshot')
  })

  describe('restoreNode', () => {
    test('writes directories, files and symlinks back', async () => {
      const snapshot = await captureSnapshot(repo, [source])
      const node = await findNode(snapshot.tree, relative(source))
      const target = path.join(workDir, 'out', 'restored')

      const stats = await restoreNode(repo, node, target, new NoProgressBars().progressCounter('restore'))

      expect(stats).toEqual({ files: 2, dirs: 2, symlinks: 1, skipped: 0, bytes: 9 })
      expect(await fs.readFile(path.join(target, 'a.txt'), 'utf-8')).toBe('alpha')
      expect(await fs.readFile(path.join(target, 'sub', 'b.txt'), 'utf-8')).toBe('beta')
      expect(await fs.readlink(path.join(target, 'link'))).toBe('a.txt')
      expect((await fs.stat(path.join(target, 'a.txt'))).mode & 0o777).toBe(0o640)
    })

    test('restores a single file', async () => {
      const snapshot = await captureSnapshot(repo, [source])
      const node = await findNode(snapshot.tree, `${relative(source)}/sub/b.txt`)
      const target = path.join(workDir, 'single.txt')

      const stats = await restoreNode(repo, node, target, new NoProgressBars().progressCounter('restore'))

      expect(stats).toEqual({ files: 1, dirs: 0, symlinks: 0, skipped: 0, bytes: 4 })
      expect(await fs.readFile(target, 'utf-8')).toBe('beta')
    })

    test('skips special files and unsafe names', async () => {
      const tree = await repo.saveTree({
        nodes: [
          { name: 'pipe', type: 'fifo', meta: {} },
          { name: '..', type: 'symlink', linktarget: 'x', meta: {} },
        ],
      })
      const node: Node = { name: 'odd', type: 'dir', subtree: tree, meta: {} }
      const target = path.join(workDir, 'odd')

      const stats = await restoreNode(repo, node, target, new NoProgressBars().progressCounter('restore'))

      expect(stats).toEqual({ files: 0, dirs: 1, symlinks: 0, skipped: 2, bytes: 0 })
      expect(await fs.readdir(target)).toEqual([])
    })
  })
})
