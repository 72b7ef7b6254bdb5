// Modal popups drawn over the current screen

import type { KeyEvent } from '../types.js'

export class PopupText {
  constructor(
    readonly title: string,
    readonly text: string
  ) {}

  get lines(): string[] {
    return this.text.split('\n')
  }
}

export type PromptResult = 'ok' | 'cancel' | 'none'

export class PopupPrompt {
  constructor(
    readonly title: string,
    readonly question: string
  ) {}

  input(key: KeyEvent): PromptResult {
    if (key.ctrl) return 'none'
    switch (key.name) {
      case 'y':
      case 'Y':
      case 'return':
        return 'ok'
      case 'n':
      case 'N':
      case 'q':
      case 'escape':
        return 'cancel'
      default:
        return 'none'
    }
  }
}

export type TextInputResult =
  | { type: 'cancel' }
  | { type: 'input'; text: string }
  | { type: 'none' }

/**
 * Read-only text popup with a fixed height and a scroll offset
 */
export class PopupScrollableText {
  readonly lines: string[]
  private offset = 0

  constructor(
    readonly title: string,
    readonly text: string,
    readonly height: number
  ) {
    this.lines = text.split('\n')
    if (this.lines.length > 1 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop()
    }
  }

  get scrollOffset(): number {
    return this.offset
  }

  /** Rows available for text inside the popup border */
  get bodyHeight(): number {
    return Math.max(1, this.height - 1)
  }

  visibleLines(): string[] {
    return this.lines.slice(this.offset, this.offset + this.bodyHeight)
  }

  input(key: KeyEvent): TextInputResult {
    const maxOffset = Math.max(0, this.lines.length - this.bodyHeight)
    switch (key.name) {
      case 'escape':
      case 'q':
        return { type: 'cancel' }
      case 'return':
        return { type: 'input', text: this.text }
      case 'down':
      case 'j':
        this.offset = Math.min(this.offset + 1, maxOffset)
        return { type: 'none' }
      case 'up':
      case 'k':
        this.offset = Math.max(this.offset - 1, 0)
        return { type: 'none' }
      case 'pagedown':
      case 'space':
        this.offset = Math.min(this.offset + this.bodyHeight, maxOffset)
        return { type: 'none' }
      case 'pageup':
        this.offset = Math.max(this.offset - this.bodyHeight, 0)
        return { type: 'none' }
      case 'g':
        this.offset = 0
        return { type: 'none' }
      case 'G':
        this.offset = maxOffset
        return { type: 'none' }
      default:
        return { type: 'none' }
    }
  }
}

export function popupText(title: string, text: string): PopupText {
  return new PopupText(title, text)
}

export function popupPrompt(title: string, question: string): PopupPrompt {
  return new PopupPrompt(title, question)
}

export function popupScrollableText(title: string, text: string, height: number): PopupScrollableText {
  return new PopupScrollableText(title, text, height)
}
