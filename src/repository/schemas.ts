import { z } from 'zod'

// Hex-encoded SHA-256
export const IdSchema = z.string().regex(/^[0-9a-f]{64}$/, 'expected a 64 character hex id')

export const NodeMetaSchema = z.object({
  size: z.number().int().nonnegative().optional(),
  uid: z.number().int().nonnegative().optional(),
  gid: z.number().int().nonnegative().optional(),
  user: z.string().optional(),
  group: z.string().optional(),
  mtime: z.coerce.date().optional(),
  mode: z.number().int().nonnegative().optional(),
})

const base = {
  name: z.string().min(1),
  meta: NodeMetaSchema,
}

export const NodeSchema = z.discriminatedUnion('type', [
  z.object({ ...base, type: z.literal('file'), content: z.array(IdSchema) }),
  z.object({ ...base, type: z.literal('dir'), subtree: IdSchema }),
  z.object({ ...base, type: z.literal('symlink'), linktarget: z.string() }),
  z.object({ ...base, type: z.enum(['dev', 'chardev', 'fifo', 'socket']) }),
])

export const TreeSchema = z.object({
  nodes: z.array(NodeSchema),
})

export const SnapshotFileSchema = z.object({
  time: z.coerce.date(),
  hostname: z.string().optional(),
  paths: z.array(z.string()),
  tree: IdSchema,
})

export const RepositoryConfigSchema = z.object({
  version: z.literal(1),
  cold: z.boolean().optional(),
})

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>
export type RepositoryConfig = z.infer<typeof RepositoryConfigSchema>
