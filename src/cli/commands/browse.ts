import { Command } from 'commander'

import { resolveSnapshot } from '../../repository/resolve.js'
import { launchTUI } from '../../tui/index.js'
import { displayError, toError } from '../display.js'
import { addRepositoryOptions, openRepository, type RepositoryCommandOptions } from './shared.js'

export const browseCommand = addRepositoryOptions(
  new Command('browse')
    .description('Browse snapshots in an interactive terminal UI')
    .argument('[snapshot]', 'Snapshot id, unique id prefix or "latest" (default: the snapshot list)')
    .option('-n, --numeric', 'Show numeric user and group ids')
    .option('--log-file <file>', 'Append log lines to this file while the UI is open')
).action(async (query: string | undefined, options: BrowseOptions) => {
  try {
    await browse(query, options)
  } catch (error) {
    displayError(toError(error))
    process.exit(1)
  }
})

interface BrowseOptions extends RepositoryCommandOptions {
  numeric?: boolean
  logFile?: string
}

async function browse(query: string | undefined, options: BrowseOptions): Promise<void> {
  const { repo, config } = await openRepository(options, {}, {
    numericIds: options.numeric,
    logFile: options.logFile,
  })
  const snapshot = query === undefined ? undefined : await resolveSnapshot(repo, query)

  await launchTUI({
    repo,
    snapshot,
    numeric: config.numericIds,
    viewLimit: config.viewLimit,
    logFile: config.logFile,
  })
}
