import { REFERENCE_COMMANDS } from '../latex/latex-patterns'
import { ReferenceOptionsError } from './errors'

export interface ReferenceOptions {
  /** Key that steps to the previous label. Defaults to 'ArrowUp'. */
  previousKey?: string
  /** Key that steps to the next label. Defaults to 'ArrowDown'. */
  nextKey?: string
  /** Key that drops the insertion and jumps to the proposed label. Defaults to 'Enter'. */
  gotoKey?: string
  /** Show the lines around the proposed label in the status text. Defaults to true. */
  showContext?: boolean
  /** Insert a bare identifier when the cursor already sits inside `\ref{...}`. Defaults to true. */
  onlyIdentifierInArgument?: boolean
  /** Reference command of the inserted skeleton, without backslash. Defaults to 'ref'. */
  referenceCommand?: string
}

export type ResolvedReferenceOptions = Required<ReferenceOptions>

export const DEFAULT_REFERENCE_OPTIONS: ResolvedReferenceOptions = {
  previousKey: 'ArrowUp',
  nextKey: 'ArrowDown',
  gotoKey: 'Enter',
  showContext: true,
  onlyIdentifierInArgument: true,
  referenceCommand: 'ref',
}

export function resolveReferenceOptions(options?: ReferenceOptions): ResolvedReferenceOptions {
  const resolved: ResolvedReferenceOptions = {
    previousKey: options?.previousKey ?? DEFAULT_REFERENCE_OPTIONS.previousKey,
    nextKey: options?.nextKey ?? DEFAULT_REFERENCE_OPTIONS.nextKey,
    gotoKey: options?.gotoKey ?? DEFAULT_REFERENCE_OPTIONS.gotoKey,
    showContext: options?.showContext ?? DEFAULT_REFERENCE_OPTIONS.showContext,
    onlyIdentifierInArgument:
      options?.onlyIdentifierInArgument ?? DEFAULT_REFERENCE_OPTIONS.onlyIdentifierInArgument,
    referenceCommand: options?.referenceCommand ?? DEFAULT_REFERENCE_OPTIONS.referenceCommand,
  }

  const keys = [resolved.previousKey, resolved.nextKey, resolved.gotoKey]
  if (keys.some((k) => k.length === 0)) {
    throw new ReferenceOptionsError('Step and goto keys must not be empty')
  }
  if (new Set(keys).size !== keys.length) {
    throw new ReferenceOptionsError(`Step and goto keys must differ: ${keys.join(', ')}`)
  }
  if (!REFERENCE_COMMANDS.includes(resolved.referenceCommand)) {
    throw new ReferenceOptionsError(
      `Unknown reference command \\${resolved.referenceCommand} ` +
        `(expected one of ${REFERENCE_COMMANDS.join(', ')})`,
    )
  }
  return resolved
}
