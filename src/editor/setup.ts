import type { HighlightStyle } from '../reference/types'

let stylesInjected = false

export const HIGHLIGHT_CLASS: Record<HighlightStyle, string> = {
  live: 'latex-reference-live',
  target: 'latex-reference-target',
}

/** Inject the decoration styles used while a reference is being chosen. Idempotent. */
export function ensureReferenceStyles(): void {
  if (stylesInjected || typeof document === 'undefined') return
  stylesInjected = true

  const style = document.createElement('style')
  style.dataset.latexReference = ''
  style.textContent = [
    `.${HIGHLIGHT_CLASS.live} { background: rgba(86, 156, 214, 0.25); border-radius: 2px; }`,
    `.${HIGHLIGHT_CLASS.target} { background: rgba(220, 180, 60, 0.35); }`,
    `.${HIGHLIGHT_CLASS.target} { outline: 1px solid rgba(220, 180, 60, 0.8); }`,
    [
      '.latex-reference-status {',
      'background:rgba(0,0,0,0.8);',
      'color:#ddd;',
      'font:12px/1.4 monospace;',
      'padding:6px 10px;',
      'border-radius:4px;',
      'white-space:pre;',
      'max-width:60ch;',
      'overflow:hidden;',
      'pointer-events:none;',
      '}',
    ].join(''),
  ].join('\n')
  document.head.appendChild(style)
}
