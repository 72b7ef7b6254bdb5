#!/usr/bin/env node
import { Command } from 'commander'
import pc from 'picocolors'

import { initCommand } from './commands/init.js'
import { snapshotCommand } from './commands/snapshot.js'
import { snapshotsCommand } from './commands/snapshots.js'
import { lsCommand } from './commands/ls.js'
import { browseCommand } from './commands/browse.js'

const VERSION = '0.1.0'

const program = new Command()
  .name('snaptree')
  .description('Browse and restore file tree snapshots in the terminal')
  .version(VERSION, '-V, --version', 'Print version')

// Add commands
program.addCommand(initCommand)
program.addCommand(snapshotCommand)
program.addCommand(snapshotsCommand)
program.addCommand(lsCommand)
program.addCommand(browseCommand)

// Custom help
program.configureHelp({
  sortSubcommands: true,
  sortOptions: true,
})

// Add examples to help
program.addHelpText(
  'after',
  `
${pc.bold('Examples:')}
  ${pc.dim('$')} snaptree init ./backup                    ${pc.dim('# Create a repository')}
  ${pc.dim('$')} snaptree snapshot ~/docs -r ./backup      ${pc.dim('# Capture a directory')}
  ${pc.dim('$')} snaptree snapshots -r ./backup            ${pc.dim('# List snapshots')}
  ${pc.dim('$')} snaptree ls latest -r ./backup            ${pc.dim('# Print every path')}
  ${pc.dim('$')} snaptree browse -r ./backup               ${pc.dim('# Open the browser')}
`
)

// Default action (no command) - show help
program.action(() => {
  program.help()
})

// Parse and run
await program.parseAsync()
