/**
 * Debug logging utility for snaptree
 *
 * Enable with SNAPTREE_DEBUG=true (or `debug: true` in .snaptreerc).
 * While the TUI owns the terminal, lines go to the configured log file or
 * are dropped.
 */

import { appendFileSync } from 'node:fs'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink =
  | { kind: 'console' }
  | { kind: 'file'; path: string }
  | { kind: 'none' }

interface LoggingSettings {
  enabled: boolean
  sink: LogSink
}

const settings: LoggingSettings = {
  enabled: process.env['SNAPTREE_DEBUG'] === 'true',
  sink: { kind: 'console' },
}

export function configureLogging(options: Partial<LoggingSettings>): void {
  if (options.enabled !== undefined) settings.enabled = options.enabled
  if (options.sink !== undefined) settings.sink = options.sink
}

interface DebugOptions {
  /** Component/module name for prefixing */
  prefix: string
  /** Whether to include timestamps */
  timestamp?: boolean
}

function write(level: LogLevel, line: string): void {
  const sink = settings.sink
  switch (sink.kind) {
    case 'none':
      return
    case 'file':
      appendFileSync(sink.path, line + '\n')
      return
    case 'console':
      if (level === 'error') console.error(line)
      else if (level === 'warn') console.warn(line)
      else console.log(line)
  }
}

class DebugLogger {
  private prefix: string
  private timestamp: boolean

  constructor(options: DebugOptions) {
    this.prefix = options.prefix
    this.timestamp = options.timestamp ?? true
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const ts = this.timestamp ? `[${new Date().toISOString()}]` : ''
    const levelTag = `[${level.toUpperCase()}]`
    const prefixTag = `[${this.prefix}]`

    let formatted = `${ts}${levelTag}${prefixTag} ${message}`
    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data)
        formatted += `\n${dataStr}`
      } catch {
        formatted += `\n[Unserializable data]`
      }
    }
    return formatted
  }

  debug(message: string, data?: unknown): void {
    if (!settings.enabled) return
    write('debug', this.formatMessage('debug', message, data))
  }

  info(message: string, data?: unknown): void {
    if (!settings.enabled) return
    write('info', this.formatMessage('info', message, data))
  }

  warn(message: string, data?: unknown): void {
    write('warn', this.formatMessage('warn', message, data))
  }

  error(message: string, data?: unknown): void {
    write('error', this.formatMessage('error', message, data))
  }
}

/** Create a debug logger for a component/module */
export function createDebugLogger(prefix: string): DebugLogger {
  return new DebugLogger({ prefix })
}

export type { DebugLogger }
