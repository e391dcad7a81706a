/** Number of consecutive backslashes ending right before `index` */
function backslashRun(text: string, index: number): number {
  let count = 0
  for (let i = index - 1; i >= 0 && text[i] === '\\'; i--) count++
  return count
}

/** A character is escaped when an odd run of backslashes precedes it */
export function isEscapedAt(text: string, index: number): boolean {
  return backslashRun(text, index) % 2 === 1
}

/** Index of the first unescaped `%` in line, or -1 when the line has no comment */
export function findCommentStart(line: string): number {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === '%' && !isEscapedAt(line, i)) return i
  }
  return -1
}

/** Extract content of a balanced brace group starting at `{` */
export function extractBraceContent(text: string, startIndex: number): string | null {
  if (text[startIndex] !== '{') return null
  let depth = 0
  for (let i = startIndex; i < text.length; i++) {
    if (isEscapedAt(text, i)) continue
    if (text[i] === '{') depth++
    else if (text[i] === '}') {
      depth--
      if (depth === 0) return text.slice(startIndex + 1, i)
    }
  }
  return null
}

/** Walk backwards from col to find the index of the opening `{` at depth 0 */
export function findOpenBrace(line: string, col: number): number {
  let depth = 0
  for (let i = col - 1; i >= 0; i--) {
    if (isEscapedAt(line, i)) continue
    if (line[i] === '}') depth++
    else if (line[i] === '{') {
      if (depth === 0) return i
      depth--
    }
  }
  return -1
}
