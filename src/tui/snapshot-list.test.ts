/**
 * Tests for src/tui/snapshot-list.ts
 */

import { describe, test, expect } from 'vitest'
import { SnapshotList, snapshotRow } from './snapshot-list.js'
import { MemoryRepository } from './test-utils.js'
import { key } from './types.js'

async function createList() {
  const repo = new MemoryRepository()
  const first = repo.addSnapshot([repo.file('old.txt', 'old')], { time: new Date(2024, 0, 1, 9, 0, 0) })
  const second = repo.addSnapshot(
    [repo.dir('docs', [repo.file('a', 'aaaa')])],
    { time: new Date(2024, 0, 2, 9, 30, 0), hostname: 'laptop', paths: ['/home/u/docs', '/etc'] }
  )
  const list = await SnapshotList.create(repo)
  return { repo, list, first, second }
}

describe('tui/SnapshotList', () => {
  test('snapshotRow shows short id, time, host and paths', async () => {
    const { second } = await createList()
    expect(snapshotRow(second)).toEqual(['00000006', '2024-01-02 09:30:00', 'laptop', '/home/u/docs,/etc'])
  })

  test('selects the newest snapshot', async () => {
    const { list } = await createList()
    expect(list.title).toBe('snapshots (2)')
    expect(list.table.selected()).toBe(1)
    expect(list.currentScreen.kind).toBe('list')
  })

  test('enter opens a browser for the selected snapshot', async () => {
    const { list, second } = await createList()

    await list.input(key('return'))

    const screen = list.currentScreen
    expect(screen.kind).toBe('browser')
    if (screen.kind !== 'browser') return
    expect(screen.browser.snapshot).toBe(second)
    expect(screen.browser.summaries).toBe(list.summaries)
  })

  test('leaving the browser root shows the list again', async () => {
    const { list } = await createList()
    await list.input(key('return'))

    expect(await list.input(key('backspace'))).toEqual({ type: 'none' })
    expect(list.currentScreen.kind).toBe('list')
  })

  test('summaries computed in one browser are reused by the next', async () => {
    const { list } = await createList()
    await list.input(key('return'))
    await list.input(key('s'))
    await list.input(key('left'))
    const summaries = list.summaries
    expect(summaries.size).toBe(2)

    await list.input(key('return'))

    const screen = list.currentScreen
    if (screen.kind !== 'browser') throw new Error('expected a browser')
    expect(screen.browser.summaries).toBe(summaries)
    expect(screen.browser.footer).toBe('total: 1, files: 1, dirs: 1, size: 4 B - Id names')
  })

  test('exit from inside a browser passes through', async () => {
    const { list } = await createList()
    await list.input(key('return'))
    await list.input(key('q'))
    expect(await list.input(key('y'))).toEqual({ type: 'exit' })
  })

  test('q opens the exit prompt, n cancels it', async () => {
    const { list } = await createList()
    await list.input(key('q'))
    expect(list.currentScreen.kind).toBe('prompt-exit')

    await list.input(key('n'))
    expect(list.currentScreen.kind).toBe('list')
  })

  test('accepting the exit prompt yields exit', async () => {
    const { list } = await createList()
    await list.input(key('escape'))
    expect(await list.input(key('return'))).toEqual({ type: 'exit' })
  })

  test('navigation keys move the selection', async () => {
    const { list, first } = await createList()
    await list.input(key('k'))
    await list.input(key('return'))
    const screen = list.currentScreen
    if (screen.kind !== 'browser') throw new Error('expected a browser')
    expect(screen.browser.snapshot).toBe(first)
  })

  test('enter on an empty list does nothing', async () => {
    const list = await SnapshotList.create(new MemoryRepository())
    await list.input(key('return'))
    expect(list.table.selected()).toBeNull()
    expect(list.currentScreen.kind).toBe('list')
  })
})
