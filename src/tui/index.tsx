// TUI entry point for the snapshot browser
// Renders the App with Ink and resolves once the user exits

import { render } from 'ink'
import type { FsRepository } from '../repository/fs-repository.js'
import type { Snapshot } from '../repository/types.js'
import { configureLogging } from '../utils/debug.js'
import { App } from './App.js'
import { ProgressStatus } from './progress-status.js'
import type { SnapshotBrowserOptions } from './snapshot-browser.js'
import { SnapshotList } from './snapshot-list.js'

export interface TUIOptions extends SnapshotBrowserOptions {
  repo: FsRepository
  /** Open this snapshot right away instead of the snapshot list */
  snapshot?: Snapshot
  /** Where log lines go while the TUI owns the terminal */
  logFile?: string
}

export async function launchTUI(options: TUIOptions): Promise<void> {
  const { repo, snapshot, logFile, ...browserOptions } = options
  const progress = new ProgressStatus()
  const list = await SnapshotList.create(repo.withProgressBars(progress.bars), browserOptions)
  if (snapshot) {
    await list.open(snapshot)
  }

  configureLogging({ sink: logFile ? { kind: 'file', path: logFile } : { kind: 'none' } })
  try {
    const instance = render(<App list={list} repoPath={repo.dir} progress={progress} />, { exitOnCtrlC: false })
    await instance.waitUntilExit()
  } finally {
    configureLogging({ sink: { kind: 'console' } })
  }
}
