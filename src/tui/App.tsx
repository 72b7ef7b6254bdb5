// Main TUI application: header, active screen, status bar
// Key events are applied one at a time, in arrival order

import { useCallback, useRef, useState, useSyncExternalStore } from 'react'
import { Box, useApp, useInput, type Key } from 'ink'
import { Header } from './components/layout/Header.js'
import { StatusBar } from './components/layout/StatusBar.js'
import { SnapshotListView } from './components/views/SnapshotListView.js'
import { useTerminalDimensions } from './hooks/useTerminalDimensions.js'
import { shouldQuit, toKeyEvent } from './keys.js'
import { formatProgress, type ProgressStatus } from './progress-status.js'
import type { SnapshotList } from './snapshot-list.js'
import type { Area } from './types.js'
import { createDebugLogger } from '../utils/debug.js'

const log = createDebugLogger('App')

// header + status bar
const CHROME_HEIGHT = 2

export function getContentArea({ width, height }: Area): Area {
  return { width: Math.max(width, 20), height: Math.max(height - CHROME_HEIGHT, 5) }
}

/** Title and mode for the header */
export function describeScreen(list: SnapshotList): { title: string; mode: string } {
  const screen = list.currentScreen
  if (screen.kind === 'browser') {
    return { title: screen.browser.title, mode: screen.browser.mode }
  }
  return { title: list.title, mode: screen.kind }
}

export interface AppHooks {
  useInput?: typeof useInput
  useApp?: typeof useApp
  useTerminalDimensions?: typeof useTerminalDimensions
}

export interface AppProps {
  list: SnapshotList
  repoPath: string
  progress: ProgressStatus
  hooks?: AppHooks
}

export function App({ list, repoPath, progress, hooks }: AppProps) {
  const inputHook = hooks?.useInput ?? useInput
  const appHook = hooks?.useApp ?? useApp
  const terminalHook = hooks?.useTerminalDimensions ?? useTerminalDimensions

  const { exit } = appHook()
  const terminal = terminalHook()
  const progressUpdate = useSyncExternalStore(progress.subscribe, progress.snapshot)
  const [error, setError] = useState<string | null>(null)
  const [, setVersion] = useState(0)
  const queue = useRef<Promise<void>>(Promise.resolve())

  const handleKey = useCallback(async (input: string, inkKey: Key) => {
    const key = toKeyEvent(input, inkKey)
    if (!key) return
    try {
      const result = await list.input(key)
      setError(null)
      if (result.type === 'exit') exit()
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      log.error('input failed', { key: key.name, message })
      setError(message)
    }
    setVersion((version) => version + 1)
  }, [list, exit])

  inputHook((input, inkKey) => {
    if (inkKey.ctrl && shouldQuit({ name: input, ctrl: true })) {
      exit()
      return
    }
    queue.current = queue.current.then(() => handleKey(input, inkKey))
  })

  const area = getContentArea(terminal)
  const { title, mode } = describeScreen(list)

  return (
    <Box flexDirection="column" width={terminal.width} height={terminal.height}>
      <Header title={title} mode={mode} />
      <SnapshotListView list={list} area={area} />
      <StatusBar repoPath={repoPath} progress={formatProgress(progressUpdate)} error={error} />
    </Box>
  )
}
