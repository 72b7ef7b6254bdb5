/**
 * Tests for src/repository/fs-repository.ts
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import { FsRepository, hashBytes, initRepository } from './fs-repository.js'
import { BlobNotFoundError, RepositoryError, SnapshotNotFoundError, TreeNotFoundError } from './errors.js'
import type { Tree } from './types.js'

describe('repository/FsRepository', () => {
  let workDir: string
  let repoDir: string

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'snaptree-repo-'))
    repoDir = path.join(workDir, 'repo')
  })

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true })
  })

  describe('initRepository', () => {
    test('creates the layout and config', async () => {
      const repo = await initRepository(repoDir)

      expect(repo.isCold()).toBe(false)
      expect((await fs.readdir(repoDir)).sort()).toEqual(['blobs', 'config.json', 'snapshots', 'trees'])
      expect(JSON.parse(await fs.readFile(path.join(repoDir, 'config.json'), 'utf-8'))).toEqual({ version: 1, cold: false })
    })

    test('records cold storage', async () => {
      await initRepository(repoDir, { cold: true })
      const repo = await FsRepository.open(repoDir)
      expect(repo.isCold()).toBe(true)
    })

    test('refuses an existing repository', async () => {
      await initRepository(repoDir)
      await expect(initRepository(repoDir)).rejects.toThrow(`repository already initialized at ${repoDir}`)
    })
  })

  describe('open', () => {
    test('fails without a repository', async () => {
      await expect(FsRepository.open(repoDir)).rejects.toThrow(`no repository found at ${repoDir}`)
    })

    test('rejects an invalid config', async () => {
      await initRepository(repoDir)
      await fs.writeFile(path.join(repoDir, 'config.json'), '{"version": 2}')
      await expect(FsRepository.open(repoDir)).rejects.toThrow(RepositoryError)
    })
  })

  describe('blobs and trees', () => {
    test('ids are the SHA-256 of the stored bytes', async () => {
      const repo = await initRepository(repoDir)
      const id = await repo.saveBlob(new TextEncoder().encode('hello'))
      expect(id).toBe(hashBytes('hello'))
      expect(id).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824')
    })

    test('saving the same blob twice keeps one copy', async () => {
      const repo = await initRepository(repoDir)
      const data = new TextEncoder().encode('same')
      await repo.saveBlob(data)
      await repo.saveBlob(data)
      expect(await fs.readdir(path.join(repoDir, 'blobs'))).toHaveLength(1)
    })

    test('trees round-trip with dates', async () => {
      const repo = await initRepository(repoDir)
      const tree: Tree = {
        nodes: [
          { name: 'a.txt', type: 'file', content: [], meta: { size: 0, mtime: new Date('2024-05-06T07:08:09.000Z'), mode: 0o644 } },
          { name: 'link', type: 'symlink', linktarget: 'a.txt', meta: {} },
        ],
      }

      const id = await repo.saveTree(tree)

      expect(await repo.getTree(id)).toEqual(tree)
    })

    test('a missing tree raises TreeNotFoundError', async () => {
      const repo = await initRepository(repoDir)
      await expect(repo.getTree('f'.repeat(64))).rejects.toThrow(TreeNotFoundError)
      await expect(repo.getTree('../config')).rejects.toThrow(TreeNotFoundError)
    })

    test('a corrupt tree raises RepositoryError', async () => {
      const repo = await initRepository(repoDir)
      const id = 'e'.repeat(64)
      await fs.writeFile(path.join(repoDir, 'trees', `${id}.json`), '{"nodes": [{"name": ""}]}')
      await expect(repo.getTree(id)).rejects.toThrow(`invalid tree ${id}`)
    })
  })

  describe('openFile', () => {
    test('reads across blob boundaries', async () => {
      const repo = await initRepository(repoDir)
      const encoder = new TextEncoder()
      const content = [
        await repo.saveBlob(encoder.encode('hello ')),
        await repo.saveBlob(encoder.encode('wide ')),
        await repo.saveBlob(encoder.encode('world')),
      ]
      const file = await repo.openFile({ name: 'f', type: 'file', content, meta: {} })

      expect(file.size).toBe(16)
      expect(new TextDecoder().decode(await file.readAt(0, 100))).toBe('hello wide world')
      expect(new TextDecoder().decode(await file.readAt(4, 6))).toBe('o wide')
      expect(new TextDecoder().decode(await file.readAt(11, 5))).toBe('world')
      expect(await file.readAt(16, 4)).toHaveLength(0)
    })

    test('a missing blob raises BlobNotFoundError', async () => {
      const repo = await initRepository(repoDir)
      await expect(repo.openFile({ name: 'f', type: 'file', content: ['0'.repeat(64)], meta: {} }))
        .rejects.toThrow(BlobNotFoundError)
    })
  })

  describe('snapshots', () => {
    test('lists snapshots oldest first', async () => {
      const repo = await initRepository(repoDir)
      const tree = await repo.saveTree({ nodes: [] })
      const newer = await repo.saveSnapshot({ time: new Date('2024-02-01T00:00:00Z'), paths: ['/b'], tree })
      const older = await repo.saveSnapshot({ time: new Date('2024-01-01T00:00:00Z'), paths: ['/a'], tree })

      const snapshots = await repo.listSnapshots()

      expect(snapshots.map((s) => s.id)).toEqual([older.id, newer.id])
      expect(snapshots[0]).toEqual(older)
    })

    test('getSnapshot raises SnapshotNotFoundError for unknown ids', async () => {
      const repo = await initRepository(repoDir)
      await expect(repo.getSnapshot('a'.repeat(64))).rejects.toThrow(SnapshotNotFoundError)
      await expect(repo.getSnapshot('nope')).rejects.toThrow(SnapshotNotFoundError)
    })
  })

  describe('withProgressBars', () => {
    test('returns a repository on the same directory with the given bars', async () => {
      const repo = await initRepository(repoDir, { cold: true })
      const bars = { progressCounter: () => ({ inc() {}, finish() {} }) }

      const withBars = repo.withProgressBars(bars)

      expect(withBars.dir).toBe(repoDir)
      expect(withBars.isCold()).toBe(true)
      expect(withBars.progressBars()).toBe(bars)
    })
  })
})
