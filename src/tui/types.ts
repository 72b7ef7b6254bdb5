/**
 * TUI input types
 */

/**
 * A key press. `name` is either a named key (return, escape, backspace,
 * left, right, up, down, pageup, pagedown, tab, space) or the text the
 * key typed ("q", "?", "G", or a whole pasted string).
 */
export interface KeyEvent {
  name: string
  ctrl?: boolean
  shift?: boolean
  meta?: boolean
}

export function key(name: string, modifiers: Omit<KeyEvent, 'name'> = {}): KeyEvent {
  return { name, ...modifiers }
}

export interface Area {
  width: number
  height: number
}
