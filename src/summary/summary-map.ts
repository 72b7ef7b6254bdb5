import type { Progress, Repository, TreeId } from '../repository/types.js'
import { createDebugLogger } from '../utils/debug.js'
import { Summary } from './summary.js'

const log = createDebugLogger('SummaryMap')

/**
 * Aggregates of already traversed subtrees, keyed by tree id.
 *
 * Entries are only added by compute() and never replaced, so a value read
 * with get() stays valid for the whole session.
 */
export class SummaryMap {
  private readonly summaries = new Map<TreeId, Summary>()

  get(id: TreeId): Summary | undefined {
    return this.summaries.get(id)
  }

  has(id: TreeId): boolean {
    return this.summaries.has(id)
  }

  get size(): number {
    return this.summaries.size
  }

  entries(): IterableIterator<[TreeId, Summary]> {
    return this.summaries.entries()
  }

  /**
   * Traverse the subtree below `id`, storing the aggregate of every directory
   * visited. Subtrees that are already cached are not fetched again; uncached
   * ones below them still are. Stops on the first fetch error.
   */
  async compute(repo: Repository, id: TreeId, progress: Progress): Promise<Summary> {
    const cached = this.summaries.get(id)
    if (cached) return cached

    const tree = await repo.getTree(id)
    const summary = new Summary()
    for (const node of tree.nodes) {
      progress.inc(1)
      if (node.type === 'dir') {
        summary.addDirectory(await this.compute(repo, node.subtree, progress))
      } else {
        summary.update(node)
      }
    }

    this.summaries.set(id, summary)
    log.debug(`computed ${id}`, { files: summary.files, dirs: summary.dirs, size: summary.size })
    return summary
  }
}
