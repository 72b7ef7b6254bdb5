import type { Command } from 'commander'
import { FsRepository, type FsRepositoryOptions } from '../../repository/fs-repository.js'
import { configureLogging } from '../../utils/debug.js'
import {
  loadConfig,
  loadConfigFromFile,
  mergeOptions,
  resolveRepositoryPath,
  type SnaptreeConfig,
} from '../config.js'

export interface RepositoryCommandOptions {
  repo?: string
  config?: string
  debug?: boolean
}

export function addRepositoryOptions(command: Command): Command {
  return command
    .option('-r, --repo <dir>', 'Repository directory (default: config or SNAPTREE_REPOSITORY)')
    .option('-c, --config <file>', 'Config file (default: nearest .snaptreerc)')
    .option('--debug', 'Print debug log lines')
}

/**
 * Config file settings with the command line flags applied on top
 */
export function loadCommandConfig(options: RepositoryCommandOptions, overrides: SnaptreeConfig = {}): SnaptreeConfig {
  const fileConfig = options.config ? loadConfigFromFile(options.config) : loadConfig()
  const config = mergeOptions(
    { ...overrides, repository: options.repo, debug: options.debug },
    fileConfig
  )
  if (config.debug !== undefined) {
    configureLogging({ enabled: config.debug })
  }
  return config
}

export async function openRepository(
  options: RepositoryCommandOptions,
  repoOptions: FsRepositoryOptions = {},
  overrides: SnaptreeConfig = {}
): Promise<{ repo: FsRepository; config: SnaptreeConfig }> {
  const config = loadCommandConfig(options, overrides)
  const repo = await FsRepository.open(resolveRepositoryPath(config), repoOptions)
  return { repo, config }
}
