import type { Key } from 'ink'
import type { KeyEvent } from './types.js'

/** Translate an Ink useInput callback into a KeyEvent */
export function toKeyEvent(input: string, key: Key): KeyEvent | null {
  const modifiers = { ctrl: key.ctrl, shift: key.shift, meta: key.meta }
  if (key.return) return { name: 'return', ...modifiers }
  if (key.escape) return { name: 'escape', ...modifiers }
  // most terminals send DEL for the backspace key, which Ink reports as delete
  if (key.backspace || key.delete) return { name: 'backspace', ...modifiers }
  if (key.leftArrow) return { name: 'left', ...modifiers }
  if (key.rightArrow) return { name: 'right', ...modifiers }
  if (key.upArrow) return { name: 'up', ...modifiers }
  if (key.downArrow) return { name: 'down', ...modifiers }
  if (key.pageUp) return { name: 'pageup', ...modifiers }
  if (key.pageDown) return { name: 'pagedown', ...modifiers }
  if (key.tab) return { name: 'tab', ...modifiers }
  if (input === ' ') return { name: 'space', ...modifiers }
  if (input.length === 0) return null
  return { name: input, ...modifiers }
}

export function shouldQuit(key: Pick<KeyEvent, 'name' | 'ctrl'>): boolean {
  return key.ctrl === true && key.name === 'c'
}

const NAMED_KEYS = new Set([
  'return',
  'escape',
  'backspace',
  'left',
  'right',
  'up',
  'down',
  'pageup',
  'pagedown',
  'tab',
])

/**
 * Text a key inserts into an input field, or null for named keys, modified
 * keys and anything holding control characters
 */
export function printableText(key: KeyEvent): string | null {
  if (key.ctrl || key.meta) return null
  if (key.name === 'space') return ' '
  if (NAMED_KEYS.has(key.name)) return null
  if (key.name.length === 0 || /[\u0000-\u001f\u007f]/.test(key.name)) return null
  return key.name
}
