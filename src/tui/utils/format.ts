import type { Node, NodeType } from '../../repository/types.js'

export function truncateTilde(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str
  return str.slice(0, maxLen - 1) + '~'
}

/** Truncate or right-pad to exactly `width` characters */
export function padCell(str: string, width: number): string {
  if (width <= 0) return ''
  return truncateTilde(str, width).padEnd(width)
}

const UNITS = ['K', 'M', 'G', 'T', 'P', 'E']

/** Binary units, one decimal: "35 B", "1.0 KiB", "1.5 MiB" */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  const exp = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), UNITS.length)
  const value = bytes / Math.pow(1024, exp)
  return `${value.toFixed(1)} ${UNITS[exp - 1]}iB`
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** Local time as YYYY-MM-DD HH:MM:SS, or "?" when unknown */
export function formatMtime(mtime: Date | undefined): string {
  if (!mtime || isNaN(mtime.getTime())) return '?'
  const date = `${mtime.getFullYear()}-${pad2(mtime.getMonth() + 1)}-${pad2(mtime.getDate())}`
  const time = `${pad2(mtime.getHours())}:${pad2(mtime.getMinutes())}:${pad2(mtime.getSeconds())}`
  return `${date} ${time}`
}

const TYPE_CHARS: Record<NodeType, string> = {
  file: '-',
  dir: 'd',
  symlink: 'l',
  dev: 'b',
  chardev: 'c',
  fifo: 'p',
  socket: 's',
}

function permissionTriplet(bits: number, special: boolean, specialChar: string): string {
  const r = bits & 4 ? 'r' : '-'
  const w = bits & 2 ? 'w' : '-'
  const exec = (bits & 1) !== 0
  let x = exec ? 'x' : '-'
  if (special) x = exec ? specialChar : specialChar.toUpperCase()
  return r + w + x
}

/** ls-style mode string such as "drwxr-xr-x" */
export function modeString(node: Node): string {
  const typeChar = TYPE_CHARS[node.type]
  const mode = node.meta.mode
  if (mode === undefined) return `${typeChar}?????????`
  return (
    typeChar +
    permissionTriplet((mode >> 6) & 7, (mode & 0o4000) !== 0, 's') +
    permissionTriplet((mode >> 3) & 7, (mode & 0o2000) !== 0, 's') +
    permissionTriplet(mode & 7, (mode & 0o1000) !== 0, 't')
  )
}

/** Number of lines, not counting a trailing newline */
export function countLines(text: string): number {
  if (text === '') return 0
  const lines = text.split('\n')
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length
}
