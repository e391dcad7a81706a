import { LABEL_PATTERN } from '../latex/latex-patterns'
import { extractBraceContent } from '../latex/latex-parser'
import { ScanError } from './errors'
import { escapeStatus } from './status'
import type { AnchorMatch, DocumentView, Position, SearchDirection, SearchMatch } from './types'

export interface ScanOptions {
  withContext?: boolean
}

/** Lines around the match, one above to one below, ready to append to a status template */
function candidateContext(doc: DocumentView, matchStart: Position): string {
  const from = doc.visualLineStart(matchStart, -1)
  const to = doc.visualLineEnd(matchStart, 1)
  return `\n\n${escapeStatus(doc.getText(from, to).trim())}`
}

function toAnchorMatch(doc: DocumentView, m: SearchMatch, withContext: boolean): AnchorMatch {
  const braceIdx = m.text.indexOf('{')
  const identifier = braceIdx < 0 ? null : extractBraceContent(m.text, braceIdx)
  if (identifier === null) {
    throw new ScanError(`Malformed label at offset ${m.start}: ${m.text}`, m.start)
  }
  const spanStart = m.start + braceIdx
  return {
    anchor: {
      identifier,
      span: { start: spanStart, end: spanStart + identifier.length + 2 },
    },
    match: { start: m.start, end: m.end },
    context: withContext ? candidateContext(doc, m.start) : '',
  }
}

/** Blank arguments and macro parameters (`\label{#1}`) never name an anchor */
function isUsableIdentifier(text: string): boolean {
  const braceIdx = text.indexOf('{')
  const arg = braceIdx < 0 ? '' : text.slice(braceIdx + 1, -1)
  return arg.trim() !== '' && !arg.includes('#')
}

/**
 * Find the label nearest to `origin` in `direction`, skipping labels inside comments
 * and labels with an unusable argument. Each call searches afresh from `origin`.
 */
export function findNext(
  doc: DocumentView,
  origin: Position,
  direction: SearchDirection,
  { withContext = false }: ScanOptions = {},
): AnchorMatch | null {
  let from = origin
  for (;;) {
    const m = doc.searchPattern(from, direction, LABEL_PATTERN)
    if (!m) return null
    if (!doc.isInComment(m.start) && isUsableIdentifier(m.text)) {
      return toAnchorMatch(doc, m, withContext)
    }
    from = direction === 'forward' ? m.end : m.start
  }
}

/** Where the scratch cursor lands after a match, mirroring an incremental search */
export function cursorAfter(match: AnchorMatch, direction: SearchDirection): Position {
  return direction === 'forward' ? match.match.end : match.match.start
}
