import pc from 'picocolors'
import type { Snapshot } from '../repository/types.js'
import { snapshotRow, LIST_HEADER } from '../tui/snapshot-list.js'
import { padCell } from '../tui/utils/format.js'

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Display the snapshots of a repository as a table, oldest first
 */
export function displaySnapshots(snapshots: Snapshot[]): void {
  if (snapshots.length === 0) {
    info('no snapshots')
    return
  }

  const rows = snapshots.map(snapshotRow)
  const widths = LIST_HEADER.map((cell, index) =>
    Math.max(cell.length, ...rows.map((row) => (row[index] ?? '').length))
  )
  const format = (row: string[]) =>
    widths.map((width, index) => padCell(row[index] ?? '', width)).join('  ').trimEnd()

  console.log(pc.bold(format(LIST_HEADER)))
  for (const row of rows) {
    console.log(format(row))
  }
  console.log(pc.dim(`${snapshots.length} snapshots`))
}

/**
 * Display an error
 */
export function displayError(error: Error): void {
  console.error()
  console.error(pc.bold(pc.red('Error')))
  console.error(pc.red(error.message))

  if (process.env['SNAPTREE_DEBUG'] === 'true' && error.stack) {
    console.error(pc.dim(error.stack))
  }
}

/**
 * Display info message
 */
export function info(message: string): void {
  console.log(pc.blue('ℹ'), message)
}

/**
 * Display success message
 */
export function success(message: string): void {
  console.log(pc.green('✓'), message)
}
