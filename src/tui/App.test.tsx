import { describe, test, expect, vi } from 'vitest'
import { render } from 'ink-testing-library'
import type { Key } from 'ink'
import { App, describeScreen, getContentArea, type AppHooks } from './App.js'
import { ProgressStatus } from './progress-status.js'
import { SnapshotList } from './snapshot-list.js'
import { createSampleRepository, waitForEffects } from './test-utils.js'

type InputHandler = (input: string, key: Key) => void

function inkKey(overrides: Partial<Key> = {}): Key {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    pageDown: false,
    pageUp: false,
    return: false,
    escape: false,
    ctrl: false,
    shift: false,
    tab: false,
    backspace: false,
    delete: false,
    meta: false,
    ...overrides,
  }
}

async function createApp() {
  const { repo } = createSampleRepository()
  const progress = new ProgressStatus()
  repo.bars = progress.bars
  const list = await SnapshotList.create(repo)
  let inputHandler: InputHandler | null = null
  const exit = vi.fn()

  const hooks: AppHooks = {
    useInput: (handler) => {
      inputHandler = handler
    },
    useApp: () => ({ exit }),
    useTerminalDimensions: () => ({ width: 120, height: 24 }),
  }

  const rendered = render(<App list={list} repoPath="/backups/main" progress={progress} hooks={hooks} />)
  const press = async (input: string, overrides: Partial<Key> = {}) => {
    if (!inputHandler) throw new Error('input handler not registered')
    inputHandler(input, inkKey(overrides))
    await waitForEffects(20)
  }
  return { repo, list, progress, exit, press, ...rendered }
}

describe('tui/App', () => {
  test('getContentArea leaves room for header and status bar', () => {
    expect(getContentArea({ width: 80, height: 24 })).toEqual({ width: 80, height: 22 })
    expect(getContentArea({ width: 80, height: 4 })).toEqual({ width: 80, height: 5 })
  })

  test('starts on the snapshot list', async () => {
    const { list, lastFrame, unmount } = await createApp()

    expect(describeScreen(list)).toEqual({ title: 'snapshots (1)', mode: 'list' })
    expect(lastFrame()).toContain('snapshots (1)')
    expect(lastFrame()).toContain('/backups/main')
    unmount()
  })

  test('enter opens the browser for the selected snapshot', async () => {
    const { list, press, lastFrame, unmount } = await createApp()

    await press('', { return: true })

    expect(describeScreen(list)).toEqual({ title: '00000005:/', mode: 'browsing' })
    expect(lastFrame()).toContain('total: 3, files: 2, dirs: 1, size: 30 B - Id names')
    unmount()
  })

  test('shows progress from the status store', async () => {
    const { press, lastFrame, unmount } = await createApp()
    await press('', { return: true })

    await press('s')

    expect(lastFrame()).toContain('computing (sub)-dir information: 4 done')
    unmount()
  })

  test('shows input failures in the status bar and keeps running', async () => {
    const { repo, list, press, lastFrame, unmount } = await createApp()
    await press('', { return: true })
    await press('G')
    const screen = list.currentScreen
    if (screen.kind !== 'browser') throw new Error('expected a browser')
    const c = screen.browser.selectedNode()
    if (c?.type !== 'dir') throw new Error('expected a directory')
    repo.failingTrees.add(c.subtree)

    await press('', { return: true })

    expect(lastFrame()).toContain('Error: tree ')
    expect(screen.browser.depth).toBe(0)

    await press('k')
    expect(lastFrame()).not.toContain('Error:')
    expect(screen.browser.table.selected()).toBe(1)
    unmount()
  })

  test('accepting the exit prompt exits the app', async () => {
    const { press, exit, unmount } = await createApp()

    await press('q')
    expect(exit).not.toHaveBeenCalled()
    await press('y')

    expect(exit).toHaveBeenCalledTimes(1)
    unmount()
  })

  test('ctrl+c exits right away', async () => {
    const { press, exit, unmount } = await createApp()
    await press('c', { ctrl: true })
    expect(exit).toHaveBeenCalledTimes(1)
    unmount()
  })

  describe('keys from the terminal', () => {
    async function createStdinApp() {
      const { repo } = createSampleRepository()
      const progress = new ProgressStatus()
      const list = await SnapshotList.create(repo)
      const hooks: AppHooks = {
        useApp: () => ({ exit: vi.fn() }),
        useTerminalDimensions: () => ({ width: 120, height: 24 }),
      }
      const rendered = render(<App list={list} repoPath="/backups/main" progress={progress} hooks={hooks} />)
      await waitForEffects(20)
      const type = async (data: string) => {
        rendered.stdin.write(data)
        await waitForEffects(20)
      }
      return { list, type, ...rendered }
    }

    test('g and G move the selection through stdin', async () => {
      const { list, type, unmount } = await createStdinApp()

      await type('\r')
      const screen = list.currentScreen
      if (screen.kind !== 'browser') throw new Error('expected the browser')

      await type('G')
      expect(screen.browser.table.selected()).toBe(2)
      await type('g')
      expect(screen.browser.table.selected()).toBe(0)
      unmount()
    })

    test('a pasted path lands in the restore target', async () => {
      const { list, type, unmount } = await createStdinApp()

      await type('\r')
      await type('r')
      const screen = list.currentScreen
      if (screen.kind !== 'browser') throw new Error('expected the browser')
      const browserScreen = screen.browser.currentScreen
      if (browserScreen.kind !== 'restore') throw new Error('expected restore mode')
      expect(browserScreen.restore.target.value).toBe('A')

      await type('\u0015')
      await type('/tmp/out')

      expect(browserScreen.restore.target.value).toBe('/tmp/out')
      unmount()
    })
  })
})
