export class RepositoryError extends Error {
  readonly code: string = 'REPOSITORY_ERROR'
  public override readonly cause?: unknown
  constructor(message: string, cause?: unknown) {
    super(message)
    this.name = 'RepositoryError'
    this.cause = cause
  }
}

export class TreeNotFoundError extends RepositoryError {
  override readonly code = 'TREE_NOT_FOUND'
  readonly treeId: string
  constructor(treeId: string, cause?: unknown) {
    super(`tree ${treeId} not found`, cause)
    this.name = 'TreeNotFoundError'
    this.treeId = treeId
  }
}

export class BlobNotFoundError extends RepositoryError {
  override readonly code = 'BLOB_NOT_FOUND'
  readonly blobId: string
  constructor(blobId: string, cause?: unknown) {
    super(`blob ${blobId} not found`, cause)
    this.name = 'BlobNotFoundError'
    this.blobId = blobId
  }
}

export class SnapshotNotFoundError extends RepositoryError {
  override readonly code = 'SNAPSHOT_NOT_FOUND'
  readonly query: string
  constructor(query: string, message = `no snapshot matches "${query}"`) {
    super(message)
    this.name = 'SnapshotNotFoundError'
    this.query = query
  }
}
