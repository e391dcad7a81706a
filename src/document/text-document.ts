import { findCommentStart, isEscapedAt } from '../latex/latex-parser'
import type {
  DocumentView,
  EditBuffer,
  Marker,
  Position,
  Region,
  SearchDirection,
  SearchMatch,
} from '../reference/types'

class TextMarker implements Marker {
  constructor(
    public start: Position,
    public end: Position,
  ) {}
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function globalPattern(pattern: RegExp): RegExp {
  const flags = pattern.global ? pattern.flags : `${pattern.flags}g`
  return new RegExp(pattern.source, flags)
}

/**
 * String-backed LaTeX document. Lines are the visual lines (no soft wrapping),
 * and markers follow the text through every edit.
 */
export class TextDocument implements DocumentView, EditBuffer {
  private text: string
  private lineStarts: number[] | null = null
  private markers = new Set<TextMarker>()
  private cursorOffset: Position

  constructor(text: string, cursor: Position = 0) {
    this.text = text
    this.cursorOffset = clamp(cursor, 0, text.length)
  }

  get length(): number {
    return this.text.length
  }

  get cursor(): Position {
    return this.cursorOffset
  }

  getText(start: Position = 0, end: Position = this.text.length): string {
    return this.text.slice(start, end)
  }

  /** Copy of the text and cursor, without markers */
  clone(): TextDocument {
    return new TextDocument(this.text, this.cursorOffset)
  }

  // --- DocumentView ---

  searchPattern(from: Position, direction: SearchDirection, pattern: RegExp): SearchMatch | null {
    const re = globalPattern(pattern)
    if (direction === 'forward') {
      re.lastIndex = from
      for (let m = re.exec(this.text); m; m = re.exec(this.text)) {
        if (!this.isEscaped(m.index)) {
          return { start: m.index, end: m.index + m[0].length, text: m[0] }
        }
        re.lastIndex = m.index + 1
      }
      return null
    }

    let last: SearchMatch | null = null
    for (const m of this.text.matchAll(re)) {
      const end = m.index + m[0].length
      if (end > from) break
      if (!this.isEscaped(m.index)) last = { start: m.index, end, text: m[0] }
    }
    return last
  }

  isInComment(position: Position): boolean {
    const line = this.lineOf(position)
    const lineText = this.text.slice(this.startOfLine(line), position)
    return findCommentStart(lineText) >= 0
  }

  isEscaped(position: Position): boolean {
    return isEscapedAt(this.text, position)
  }

  visualLineStart(position: Position, offsetLines: number): Position {
    return this.startOfLine(this.lineOf(position) + offsetLines)
  }

  visualLineEnd(position: Position, offsetLines: number): Position {
    const starts = this.getLineStarts()
    const line = clamp(this.lineOf(position) + offsetLines, 0, starts.length - 1)
    const next = starts[line + 1]
    return next === undefined ? this.text.length : next - 1
  }

  /** Zero-based line holding `position` */
  lineOf(position: Position): number {
    const starts = this.getLineStarts()
    let lo = 0
    let hi = starts.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1
      if ((starts[mid] ?? 0) <= position) lo = mid
      else hi = mid - 1
    }
    return lo
  }

  private startOfLine(line: number): Position {
    const starts = this.getLineStarts()
    return starts[clamp(line, 0, starts.length - 1)] ?? 0
  }

  private getLineStarts(): number[] {
    if (!this.lineStarts) {
      const starts = [0]
      for (let i = 0; i < this.text.length; i++) {
        if (this.text[i] === '\n') starts.push(i + 1)
      }
      this.lineStarts = starts
    }
    return this.lineStarts
  }

  // --- EditBuffer ---

  insert(position: Position, text: string): Marker {
    const at = clamp(position, 0, this.text.length)
    this.applyEdit(at, at, text, null)
    const marker = new TextMarker(at, at + text.length)
    this.markers.add(marker)
    return marker
  }

  mark(region: Region): Marker {
    if (region.start < 0 || region.end > this.text.length || region.start > region.end) {
      throw new RangeError(`Region [${region.start}, ${region.end}) is outside the document`)
    }
    const marker = new TextMarker(region.start, region.end)
    this.markers.add(marker)
    return marker
  }

  replace(marker: Marker, text: string): void {
    const target = this.ownMarker(marker)
    this.applyEdit(target.start, target.end, text, target)
  }

  release(marker: Marker): void {
    this.markers.delete(this.ownMarker(marker))
  }

  setCursor(position: Position): void {
    this.cursorOffset = clamp(position, 0, this.text.length)
  }

  private ownMarker(marker: Marker): TextMarker {
    if (marker instanceof TextMarker && this.markers.has(marker)) return marker
    throw new Error('Marker does not belong to this document or was released')
  }

  private applyEdit(start: Position, end: Position, text: string, target: TextMarker | null): void {
    this.text = this.text.slice(0, start) + text + this.text.slice(end)
    this.lineStarts = null
    const delta = text.length - (end - start)

    for (const m of this.markers) {
      if (m === target) {
        m.start = start
        m.end = start + text.length
      } else if (m.start <= start && m.end >= end) {
        m.end += delta
      } else if (m.start >= end) {
        m.start += delta
        m.end += delta
      } else if (m.end > start) {
        // Partial overlap: keep whatever survives on either side
        m.start = Math.min(m.start, start)
        m.end = Math.max(start + text.length, m.end + delta)
      }
    }

    if (this.cursorOffset >= end) this.cursorOffset += delta
    else if (this.cursorOffset > start) this.cursorOffset = start + text.length
  }
}
