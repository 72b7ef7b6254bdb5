/**
 * File-system repository
 *
 * Layout:
 *   config.json          { version: 1, cold?: boolean }
 *   snapshots/<id>.json  snapshot file
 *   trees/<id>.json      tree
 *   blobs/<id>           raw file content chunk
 *
 * Every id is the SHA-256 of the bytes stored under it.
 */

import { createHash } from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ZodError, type ZodType, type ZodTypeDef } from 'zod'
import { BlobNotFoundError, RepositoryError, SnapshotNotFoundError, TreeNotFoundError } from './errors.js'
import { NoProgressBars } from './progress.js'
import {
  IdSchema,
  RepositoryConfigSchema,
  SnapshotFileSchema,
  TreeSchema,
  type RepositoryConfig,
  type SnapshotFile,
} from './schemas.js'
import type {
  BlobId,
  FileNode,
  OpenFile,
  ProgressBars,
  Repository,
  Snapshot,
  Tree,
  TreeId,
} from './types.js'

const CONFIG_FILE = 'config.json'
const SNAPSHOTS_DIR = 'snapshots'
const TREES_DIR = 'trees'
const BLOBS_DIR = 'blobs'

export interface FsRepositoryOptions {
  progressBars?: ProgressBars
}

export interface InitRepositoryOptions {
  cold?: boolean
}

export function hashBytes(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex')
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function parseJson<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: string, what: string): T {
  try {
    return schema.parse(JSON.parse(raw))
  } catch (error) {
    if (error instanceof SyntaxError || error instanceof ZodError) {
      throw new RepositoryError(`invalid ${what}: ${error.message}`, error)
    }
    throw error
  }
}

export async function initRepository(dir: string, options: InitRepositoryOptions = {}): Promise<FsRepository> {
  const configPath = path.join(dir, CONFIG_FILE)
  try {
    await fs.access(configPath)
    throw new RepositoryError(`repository already initialized at ${dir}`)
  } catch (error) {
    if (!isNotFound(error)) throw error
  }

  for (const sub of [SNAPSHOTS_DIR, TREES_DIR, BLOBS_DIR]) {
    await fs.mkdir(path.join(dir, sub), { recursive: true })
  }
  const config: RepositoryConfig = { version: 1, cold: options.cold ?? false }
  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n')
  return new FsRepository(dir, config)
}

interface Chunk {
  id: BlobId
  size: number
}

class FsOpenFile implements OpenFile {
  readonly size: number

  constructor(private readonly repo: FsRepository, private readonly chunks: Chunk[]) {
    this.size = chunks.reduce((sum, chunk) => sum + chunk.size, 0)
  }

  async readAt(offset: number, length: number): Promise<Uint8Array> {
    const end = Math.min(offset + length, this.size)
    const parts: Buffer[] = []
    let chunkStart = 0

    for (const chunk of this.chunks) {
      const chunkEnd = chunkStart + chunk.size
      if (chunkEnd > offset && chunkStart < end) {
        const data = await this.repo.readBlob(chunk.id)
        parts.push(data.subarray(Math.max(offset - chunkStart, 0), Math.min(end, chunkEnd) - chunkStart))
      }
      if (chunkEnd >= end) break
      chunkStart = chunkEnd
    }

    return new Uint8Array(Buffer.concat(parts))
  }
}

export class FsRepository implements Repository {
  private readonly bars: ProgressBars

  constructor(
    readonly dir: string,
    private readonly config: RepositoryConfig,
    options: FsRepositoryOptions = {}
  ) {
    this.bars = options.progressBars ?? new NoProgressBars()
  }

  static async open(dir: string, options: FsRepositoryOptions = {}): Promise<FsRepository> {
    let raw: string
    try {
      raw = await fs.readFile(path.join(dir, CONFIG_FILE), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) {
        throw new RepositoryError(`no repository found at ${dir}`, error)
      }
      throw new RepositoryError(`cannot read repository config in ${dir}`, error)
    }
    const config = parseJson(RepositoryConfigSchema, raw, `repository config in ${dir}`)
    return new FsRepository(dir, config, options)
  }

  withProgressBars(progressBars: ProgressBars): FsRepository {
    return new FsRepository(this.dir, this.config, { progressBars })
  }

  isCold(): boolean {
    return this.config.cold === true
  }

  progressBars(): ProgressBars {
    return this.bars
  }

  async getTree(id: TreeId): Promise<Tree> {
    if (!IdSchema.safeParse(id).success) {
      throw new TreeNotFoundError(id)
    }
    let raw: string
    try {
      raw = await fs.readFile(path.join(this.dir, TREES_DIR, `${id}.json`), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) throw new TreeNotFoundError(id, error)
      throw new RepositoryError(`cannot read tree ${id}`, error)
    }
    return parseJson(TreeSchema, raw, `tree ${id}`)
  }

  async readBlob(id: BlobId): Promise<Buffer> {
    try {
      return await fs.readFile(path.join(this.dir, BLOBS_DIR, id))
    } catch (error) {
      if (isNotFound(error)) throw new BlobNotFoundError(id, error)
      throw new RepositoryError(`cannot read blob ${id}`, error)
    }
  }

  async openFile(node: FileNode): Promise<OpenFile> {
    const chunks: Chunk[] = []
    for (const id of node.content) {
      try {
        const stat = await fs.stat(path.join(this.dir, BLOBS_DIR, id))
        chunks.push({ id, size: stat.size })
      } catch (error) {
        if (isNotFound(error)) throw new BlobNotFoundError(id, error)
        throw new RepositoryError(`cannot stat blob ${id}`, error)
      }
    }
    return new FsOpenFile(this, chunks)
  }

  async listSnapshots(): Promise<Snapshot[]> {
    const entries = await fs.readdir(path.join(this.dir, SNAPSHOTS_DIR))
    const snapshots: Snapshot[] = []
    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue
      snapshots.push(await this.getSnapshot(entry.slice(0, -'.json'.length)))
    }
    return snapshots.sort((a, b) => a.time.getTime() - b.time.getTime())
  }

  async getSnapshot(id: string): Promise<Snapshot> {
    if (!IdSchema.safeParse(id).success) {
      throw new SnapshotNotFoundError(id)
    }
    let raw: string
    try {
      raw = await fs.readFile(path.join(this.dir, SNAPSHOTS_DIR, `${id}.json`), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) throw new SnapshotNotFoundError(id)
      throw new RepositoryError(`cannot read snapshot ${id}`, error)
    }
    const file = parseJson(SnapshotFileSchema, raw, `snapshot ${id}`)
    return { id, ...file }
  }

  async saveBlob(data: Uint8Array): Promise<BlobId> {
    const id = hashBytes(data)
    await this.writeOnce(path.join(this.dir, BLOBS_DIR, id), data)
    return id
  }

  async saveTree(tree: Tree): Promise<TreeId> {
    const raw = JSON.stringify(tree)
    const id = hashBytes(raw)
    await this.writeOnce(path.join(this.dir, TREES_DIR, `${id}.json`), raw)
    return id
  }

  async saveSnapshot(file: SnapshotFile): Promise<Snapshot> {
    const raw = JSON.stringify(file, null, 2) + '\n'
    const id = hashBytes(raw)
    await this.writeOnce(path.join(this.dir, SNAPSHOTS_DIR, `${id}.json`), raw)
    return { id, ...file }
  }

  // content-addressed, so an existing file already holds these bytes
  private async writeOnce(target: string, data: Uint8Array | string): Promise<void> {
    try {
      await fs.writeFile(target, data, { flag: 'wx' })
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') return
      throw new RepositoryError(`cannot write ${target}`, error)
    }
  }
}
