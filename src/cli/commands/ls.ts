import { Command } from 'commander'

import { resolveSnapshot, walkTree } from '../../repository/resolve.js'
import { displayError, toError } from '../display.js'
import { addRepositoryOptions, openRepository, type RepositoryCommandOptions } from './shared.js'

export const lsCommand = addRepositoryOptions(
  new Command('ls')
    .description('Print every path of a snapshot, depth first')
    .argument('<snapshot>', 'Snapshot id, unique id prefix or "latest"')
).action(async (query: string, options: RepositoryCommandOptions) => {
  try {
    const { repo } = await openRepository(options)
    const snapshot = await resolveSnapshot(repo, query)
    for await (const entry of walkTree(repo, snapshot.tree)) {
      console.log(entry.path)
    }
  } catch (error) {
    displayError(toError(error))
    process.exit(1)
  }
})
