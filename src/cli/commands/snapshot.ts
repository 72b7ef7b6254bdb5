import { Command } from 'commander'
import pc from 'picocolors'

import { captureSnapshot } from '../../repository/capture.js'
import { OraProgressBars } from '../../repository/progress.js'
import { shortId } from '../../repository/types.js'
import { displayError, info, success, toError } from '../display.js'
import { addRepositoryOptions, openRepository, type RepositoryCommandOptions } from './shared.js'

export const snapshotCommand = addRepositoryOptions(
  new Command('snapshot')
    .description('Capture local files and directories into a new snapshot')
    .argument('<paths...>', 'Files or directories to capture')
    .option('--host <name>', 'Hostname to record (default: this machine)')
).action(async (paths: string[], options: SnapshotOptions) => {
  try {
    await snapshot(paths, options)
  } catch (error) {
    displayError(toError(error))
    process.exit(1)
  }
})

interface SnapshotOptions extends RepositoryCommandOptions {
  host?: string
}

async function snapshot(paths: string[], options: SnapshotOptions): Promise<void> {
  const { repo } = await openRepository(options, { progressBars: new OraProgressBars() })
  info(`Capturing ${paths.map((p) => pc.cyan(p)).join(', ')}`)

  const progress = repo.progressBars().progressCounter('capturing entries')
  const saved = await captureSnapshot(repo, paths, { hostname: options.host, progress })

  success(`Snapshot ${pc.cyan(shortId(saved.id))} saved`)
}
