import { Command } from 'commander'

import { displayError, displaySnapshots, toError } from '../display.js'
import { addRepositoryOptions, openRepository, type RepositoryCommandOptions } from './shared.js'

export const snapshotsCommand = addRepositoryOptions(
  new Command('snapshots').description('List the snapshots of a repository')
).action(async (options: RepositoryCommandOptions) => {
  try {
    const { repo } = await openRepository(options)
    displaySnapshots(await repo.listSnapshots())
  } catch (error) {
    displayError(toError(error))
    process.exit(1)
  }
})
