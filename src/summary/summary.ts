import type { Node } from '../repository/types.js'

/**
 * File count, directory count and total size of a set of entries
 */
export class Summary {
  constructor(
    public files = 0,
    public dirs = 0,
    public size = 0
  ) {}

  /** Count one entry using only its own metadata */
  update(node: Node): void {
    if (node.type === 'dir') {
      this.dirs += 1
    } else {
      this.files += 1
    }
    this.size += node.meta.size ?? 0
  }

  merge(other: Summary): void {
    this.files += other.files
    this.dirs += other.dirs
    this.size += other.size
  }

  /** Count one directory entry whose subtree aggregate is already known */
  addDirectory(subtree: Summary): void {
    this.dirs += 1
    this.merge(subtree)
  }
}
