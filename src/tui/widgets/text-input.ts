import { printableText } from '../keys.js'
import type { KeyEvent } from '../types.js'

/**
 * Single-line editable value with a cursor
 */
export class TextInput {
  private chars: string[]
  private position: number

  constructor(initial = '') {
    this.chars = Array.from(initial)
    this.position = this.chars.length
  }

  get value(): string {
    return this.chars.join('')
  }

  get cursor(): number {
    return this.position
  }

  /** Apply an editing key; returns false for keys it does not handle */
  input(key: KeyEvent): boolean {
    if (key.ctrl) {
      switch (key.name) {
        case 'u':
          this.chars = this.chars.slice(this.position)
          this.position = 0
          return true
        case 'a':
          this.position = 0
          return true
        case 'e':
          this.position = this.chars.length
          return true
        default:
          return false
      }
    }
    switch (key.name) {
      case 'left':
        this.position = Math.max(0, this.position - 1)
        return true
      case 'right':
        this.position = Math.min(this.chars.length, this.position + 1)
        return true
      case 'backspace':
        if (this.position > 0) {
          this.chars.splice(this.position - 1, 1)
          this.position -= 1
        }
        return true
    }
    const text = printableText(key)
    if (text !== null) {
      // a paste arrives as one event carrying the whole string
      const inserted = Array.from(text)
      this.chars.splice(this.position, 0, ...inserted)
      this.position += inserted.length
      return true
    }
    return false
  }
}
