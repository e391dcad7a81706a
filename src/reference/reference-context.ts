import { findOpenBrace } from '../latex/latex-parser'
import { REF_BEFORE_BRACE_RE } from '../latex/latex-patterns'
import type { DocumentView, Position } from './types'

/** True when `position` sits inside the braces of `\ref{...}` or a sibling command */
export function isInReferenceArgument(doc: DocumentView, position: Position): boolean {
  const lineStart = doc.visualLineStart(position, 0)
  const before = doc.getText(lineStart, position)
  const brace = findOpenBrace(before, before.length)
  if (brace < 0) return false

  const cmd = before.slice(0, brace).match(REF_BEFORE_BRACE_RE)
  if (!cmd || cmd.index === undefined) return false
  return !doc.isEscaped(lineStart + cmd.index)
}
