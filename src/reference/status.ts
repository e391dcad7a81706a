import type { ResolvedReferenceOptions } from './options'
import type { SearchDirection } from './types'

/** Expand `%d`/`%s` with args and collapse `%%` to a literal percent sign */
export function formatStatus(template: string, ...args: (string | number)[]): string {
  let next = 0
  return template.replace(/%([%ds])/g, (whole, conversion: string) => {
    if (conversion === '%') return '%'
    if (next >= args.length) return whole
    const arg = args[next++]
    return conversion === 'd' ? String(Math.trunc(Number(arg))) : String(arg)
  })
}

/** Escape text for use inside a status template */
export function escapeStatus(text: string): string {
  return text.replaceAll('%', '%%')
}

export function directionPrompt(options: ResolvedReferenceOptions): string {
  return formatStatus('Find label: [%s] previous, [%s] next', options.previousKey, options.nextKey)
}

/**
 * Status line for the current step. `context` is expected to be escaped already,
 * it is appended to the template before formatting.
 */
export function stepStatus(
  stepIndex: number,
  context: string,
  options: ResolvedReferenceOptions,
): string {
  return formatStatus(
    `Label %d: [%s] previous, [%s] next, [%s] go to label${context}`,
    stepIndex,
    options.previousKey,
    options.nextKey,
    options.gotoKey,
  )
}

export function noCandidateStatus(
  direction: SearchDirection,
  stepIndex: number,
  context: string,
  options: ResolvedReferenceOptions,
): string {
  const lead = direction === 'backward' ? 'No previous label. ' : 'No next label. '
  return lead + stepStatus(stepIndex, context, options)
}
