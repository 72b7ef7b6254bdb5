/**
 * Tests for src/tui/widgets/text-input.ts
 */

import { describe, test, expect } from 'vitest'
import { TextInput } from './text-input.js'
import { key } from '../types.js'

describe('tui/widgets/TextInput', () => {
  test('starts with the cursor after the initial value', () => {
    const input = new TextInput('/tmp')
    expect(input.value).toBe('/tmp')
    expect(input.cursor).toBe(4)
  })

  test('inserts printable characters at the cursor', () => {
    const input = new TextInput('ac')
    input.input(key('left'))
    expect(input.input(key('b'))).toBe(true)
    expect(input.value).toBe('abc')
    expect(input.cursor).toBe(2)
  })

  test('space inserts a blank', () => {
    const input = new TextInput('a')
    input.input(key('space'))
    expect(input.value).toBe('a ')
  })

  test('backspace deletes before the cursor', () => {
    const input = new TextInput('abc')
    input.input(key('backspace'))
    expect(input.value).toBe('ab')
    input.input(key('a', { ctrl: true }))
    input.input(key('backspace'))
    expect(input.value).toBe('ab')
  })

  test('ctrl+a, ctrl+e, left and right move the cursor within bounds', () => {
    const input = new TextInput('abc')
    input.input(key('right'))
    expect(input.cursor).toBe(3)
    input.input(key('a', { ctrl: true }))
    input.input(key('left'))
    expect(input.cursor).toBe(0)
    input.input(key('e', { ctrl: true }))
    expect(input.cursor).toBe(3)
  })

  test('inserts a pasted string at the cursor', () => {
    const input = new TextInput('/data')
    input.input(key('a', { ctrl: true }))
    expect(input.input(key('/tmp/é'))).toBe(true)
    expect(input.value).toBe('/tmp/é/data')
    expect(input.cursor).toBe(6)
  })

  test('ctrl+u clears up to the cursor', () => {
    const input = new TextInput('/old/path')
    input.input(key('left'))
    input.input(key('left'))
    input.input(key('left'))
    input.input(key('left'))
    input.input(key('u', { ctrl: true }))
    expect(input.value).toBe('path')
    expect(input.cursor).toBe(0)
  })

  test('ignores control keys it does not handle', () => {
    const input = new TextInput('a')
    expect(input.input(key('escape'))).toBe(false)
    expect(input.input(key('x', { ctrl: true }))).toBe(false)
    expect(input.value).toBe('a')
  })
})
