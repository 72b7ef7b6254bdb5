// Single-selection table model with vim-style navigation

import type { KeyEvent } from '../types.js'

export type Row = string[]

export const PAGE_SIZE = 10

export function clampSelectedIndex(selectedIndex: number, itemsLength: number): number {
  if (itemsLength <= 0) return 0
  return Math.max(0, Math.min(selectedIndex, itemsLength - 1))
}

/**
 * Next selection for a navigation key, or null when the key is not a
 * navigation key
 */
export function applySelectKey(selected: number, key: KeyEvent, itemsLength: number): number | null {
  const maxIndex = Math.max(0, itemsLength - 1)

  switch (key.name) {
    case 'j':
    case 'down':
      return Math.min(selected + 1, maxIndex)
    case 'k':
    case 'up':
      return Math.max(selected - 1, 0)
    case 'pagedown':
      return Math.min(selected + PAGE_SIZE, maxIndex)
    case 'pageup':
      return Math.max(selected - PAGE_SIZE, 0)
    case 'g':
      return 0
    case 'G':
      return maxIndex
    default:
      return null
  }
}

/**
 * Window of rows to draw so that the selection stays in view
 */
export function getVisibleWindow(rowCount: number, selected: number | null, height: number): { start: number; end: number } {
  if (height <= 0) return { start: 0, end: 0 }
  if (rowCount <= height) return { start: 0, end: rowCount }
  const target = Math.floor(height / 2)
  const start = Math.min(Math.max(0, (selected ?? 0) - target), rowCount - height)
  return { start, end: start + height }
}

export class SelectTable {
  private rows: Row[] = []
  private selectedIndex: number | null = null

  constructor(readonly header: Row) {}

  get content(): readonly Row[] {
    return this.rows
  }

  selected(): number | null {
    return this.selectedIndex
  }

  setContent(rows: Row[]): void {
    this.rows = rows
    if (this.selectedIndex !== null) {
      this.selectedIndex = rows.length === 0 ? null : clampSelectedIndex(this.selectedIndex, rows.length)
    }
  }

  select(index: number | null): void {
    this.selectedIndex = index === null || this.rows.length === 0
      ? null
      : clampSelectedIndex(index, this.rows.length)
  }

  /** Set the selection without clamping; the next setContent clamps it */
  setTo(index: number): void {
    this.selectedIndex = index
  }

  input(key: KeyEvent): void {
    if (this.rows.length === 0) return
    const next = applySelectKey(this.selectedIndex ?? 0, key, this.rows.length)
    if (next !== null) this.selectedIndex = next
  }
}
