import { Command } from 'commander'
import pc from 'picocolors'
import * as path from 'path'

import { initRepository } from '../../repository/fs-repository.js'
import { displayError, success, toError } from '../display.js'

export const initCommand = new Command('init')
  .description('Create an empty repository')
  .argument('<repo>', 'Repository directory to create')
  .option('--cold', 'Mark the repository as cold storage (file contents cannot be viewed)')
  .action(async (repo: string, options: InitOptions) => {
    try {
      await init(repo, options)
    } catch (error) {
      displayError(toError(error))
      process.exit(1)
    }
  })

interface InitOptions {
  cold?: boolean
}

async function init(repo: string, options: InitOptions): Promise<void> {
  const targetDir = path.resolve(process.cwd(), repo)
  await initRepository(targetDir, { cold: options.cold ?? false })
  success(`Created ${options.cold ? 'cold ' : ''}repository at ${pc.cyan(targetDir)}`)
}
