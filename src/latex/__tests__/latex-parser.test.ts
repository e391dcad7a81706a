import { describe, expect, it } from 'vitest'
import {
  extractBraceContent,
  findCommentStart,
  findOpenBrace,
  isEscapedAt,
} from '../latex-parser'

describe('isEscapedAt', () => {
  it('detects a single preceding backslash', () => {
    expect(isEscapedAt('a\\%b', 2)).toBe(true)
  })

  it('treats an even run of backslashes as unescaped', () => {
    expect(isEscapedAt('\\\\%', 2)).toBe(false)
  })

  it('is false at the start of the text', () => {
    expect(isEscapedAt('%', 0)).toBe(false)
  })
})

describe('findCommentStart', () => {
  it('finds the first percent sign', () => {
    expect(findCommentStart('text % c')).toBe(5)
  })

  it('skips escaped percent signs', () => {
    expect(findCommentStart('a \\% b % c')).toBe(7)
  })

  it('returns -1 without a comment', () => {
    expect(findCommentStart('no comment')).toBe(-1)
  })
})

describe('extractBraceContent', () => {
  it('extracts nested groups', () => {
    expect(extractBraceContent('{a{b}c}', 0)).toBe('a{b}c')
  })

  it('returns null for an unclosed group', () => {
    expect(extractBraceContent('{abc', 0)).toBeNull()
  })

  it('returns null when not starting at a brace', () => {
    expect(extractBraceContent('x', 0)).toBeNull()
  })

  it('ignores escaped closing braces', () => {
    expect(extractBraceContent('{a\\}b}', 0)).toBe('a\\}b')
  })
})

describe('findOpenBrace', () => {
  it('finds the enclosing brace', () => {
    expect(findOpenBrace('\\ref{abc', 8)).toBe(4)
  })

  it('returns -1 once the group is closed', () => {
    expect(findOpenBrace('\\ref{a} x', 9)).toBe(-1)
  })
})
