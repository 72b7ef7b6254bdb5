import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR'

  constructor(message: string, override readonly cause?: unknown) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const SnaptreeConfigSchema = z
  .object({
    /** Repository directory used when no -r/--repo is given */
    repository: z.string().min(1).optional(),
    /** Start the browser with numeric user/group ids */
    numericIds: z.boolean().optional(),
    /** Append log lines here while the TUI is running */
    logFile: z.string().min(1).optional(),
    /** Emit debug and info log lines */
    debug: z.boolean().optional(),
    /** Most bytes read when viewing a file */
    viewLimit: z.number().int().positive().optional(),
  })
  .strict()

/**
 * Configuration options for snaptree
 */
export type SnaptreeConfig = z.infer<typeof SnaptreeConfigSchema>

/**
 * Config file names to search for, in order of priority
 */
const CONFIG_FILES = ['.snaptreerc', '.snaptreerc.json']

/**
 * Find the config file in the given directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir

  while (true) {
    for (const configFile of CONFIG_FILES) {
      const configPath = path.join(currentDir, configFile)
      if (fs.existsSync(configPath)) {
        return configPath
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached filesystem root
      break
    }
    currentDir = parentDir
  }

  return null
}

function loadJsonConfig(configPath: string): SnaptreeConfig {
  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(
        `Invalid JSON in config file: ${configPath}\n` +
          `Reason: ${error.message}`,
        error
      )
    }
    throw new ConfigError(`Failed to read config file: ${configPath}`, error)
  }

  const result = SnaptreeConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `'${issue.path.join('.') || '(root)'}': ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid config in ${configPath}: ${issues}`, result.error)
  }
  return result.data
}

/**
 * Load configuration from the nearest config file at or above `startDir`
 *
 * @returns Loaded config or an empty object if no config file is found
 */
export function loadConfig(startDir?: string): SnaptreeConfig {
  const configPath = findConfigFile(startDir || process.cwd())
  return configPath ? loadJsonConfig(configPath) : {}
}

export function loadConfigFromFile(configPath: string): SnaptreeConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`)
  }
  return loadJsonConfig(configPath)
}

/**
 * Get the path to the config file loadConfig would use, if any
 */
export function getConfigPath(startDir?: string): string | null {
  return findConfigFile(startDir || process.cwd())
}

/**
 * Merge CLI options with config file settings
 * CLI options take precedence; undefined means the flag was not given
 */
export function mergeOptions(cliOptions: SnaptreeConfig, config: SnaptreeConfig): SnaptreeConfig {
  const merged: SnaptreeConfig = { ...config }
  if (cliOptions.repository !== undefined) merged.repository = cliOptions.repository
  if (cliOptions.numericIds !== undefined) merged.numericIds = cliOptions.numericIds
  if (cliOptions.logFile !== undefined) merged.logFile = cliOptions.logFile
  if (cliOptions.debug !== undefined) merged.debug = cliOptions.debug
  if (cliOptions.viewLimit !== undefined) merged.viewLimit = cliOptions.viewLimit
  return merged
}

/**
 * Repository directory from the merged options, falling back to
 * SNAPTREE_REPOSITORY
 */
export function resolveRepositoryPath(
  options: SnaptreeConfig,
  env: NodeJS.ProcessEnv = process.env
): string {
  const repository = options.repository ?? env['SNAPTREE_REPOSITORY']
  if (!repository) {
    throw new ConfigError(
      'No repository given: pass -r/--repo, set "repository" in .snaptreerc or set SNAPTREE_REPOSITORY'
    )
  }
  return path.resolve(repository)
}
