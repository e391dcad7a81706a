import { describe, expect, it } from 'vitest'
import { ReferenceOptionsError } from '../errors'
import { chordName, classifyKey, isPrintableKey } from '../keys'
import { DEFAULT_REFERENCE_OPTIONS, resolveReferenceOptions } from '../options'
import {
  directionPrompt,
  escapeStatus,
  formatStatus,
  noCandidateStatus,
  stepStatus,
} from '../status'

const HINT = '[ArrowUp] previous, [ArrowDown] next, [Enter] go to label'

describe('resolveReferenceOptions', () => {
  it('fills in defaults', () => {
    expect(resolveReferenceOptions()).toEqual(DEFAULT_REFERENCE_OPTIONS)
  })

  it('keeps overrides', () => {
    const opts = resolveReferenceOptions({ previousKey: 'p', nextKey: 'n', showContext: false })
    expect(opts.previousKey).toBe('p')
    expect(opts.nextKey).toBe('n')
    expect(opts.gotoKey).toBe('Enter')
    expect(opts.showContext).toBe(false)
  })

  it('rejects duplicate keys', () => {
    expect(() => resolveReferenceOptions({ nextKey: 'ArrowUp' })).toThrow(ReferenceOptionsError)
  })

  it('rejects empty keys', () => {
    expect(() => resolveReferenceOptions({ gotoKey: '' })).toThrow(
      'Step and goto keys must not be empty',
    )
  })

  it('rejects unknown reference commands', () => {
    expect(() => resolveReferenceOptions({ referenceCommand: 'textbf' })).toThrow(
      /Unknown reference command \\textbf/,
    )
  })
})

describe('classifyKey', () => {
  const opts = resolveReferenceOptions()

  it('maps the configured keys', () => {
    expect(classifyKey('ArrowUp', opts)).toEqual({ type: 'previous' })
    expect(classifyKey('ArrowDown', opts)).toEqual({ type: 'next' })
    expect(classifyKey('Enter', opts)).toEqual({ type: 'goto' })
  })

  it('ignores modifiers', () => {
    expect(classifyKey('Shift', opts)).toEqual({ type: 'ignore' })
  })

  it('flags printable keys', () => {
    expect(classifyKey('a', opts)).toEqual({ type: 'other', key: 'a', printable: true })
    expect(classifyKey('Escape', opts)).toEqual({ type: 'other', key: 'Escape', printable: false })
  })

  it('counts a surrogate pair as one character', () => {
    expect(isPrintableKey('😀')).toBe(true)
  })
})

describe('chordName', () => {
  const plain = { ctrlKey: false, altKey: false, metaKey: false }

  it('keeps unmodified keys', () => {
    expect(chordName({ ...plain, key: 's' })).toBe('s')
    expect(chordName({ ...plain, key: 'ArrowDown' })).toBe('ArrowDown')
  })

  it('prefixes shortcuts so they are not typed', () => {
    const name = chordName({ ...plain, key: 's', ctrlKey: true })
    expect(name).toBe('Ctrl+s')
    expect(classifyKey(name, DEFAULT_REFERENCE_OPTIONS)).toEqual({
      type: 'other',
      key: 'Ctrl+s',
      printable: false,
    })
    expect(chordName({ key: 'c', ctrlKey: true, altKey: true, metaKey: true })).toBe(
      'Ctrl+Alt+Meta+c',
    )
  })

  it('keeps characters typed with AltGr', () => {
    const altGr = { key: '@', ctrlKey: true, altKey: true, metaKey: false, altGraphKey: true }
    expect(chordName(altGr)).toBe('@')
  })

  it('leaves a lone modifier as is', () => {
    expect(chordName({ ...plain, key: 'Control', ctrlKey: true })).toBe('Control')
  })
})

describe('status text', () => {
  it('formats numbers, strings and literal percent signs', () => {
    expect(formatStatus('%d%% of %s', 50, 'x')).toBe('50% of x')
  })

  it('leaves placeholders without arguments untouched', () => {
    expect(formatStatus('%s')).toBe('%s')
  })

  it('escapes percent signs', () => {
    expect(escapeStatus('a%b')).toBe('a%%b')
  })

  it('builds the direction prompt', () => {
    expect(directionPrompt(DEFAULT_REFERENCE_OPTIONS)).toBe(
      'Find label: [ArrowUp] previous, [ArrowDown] next',
    )
  })

  it('appends escaped context to the step message', () => {
    expect(stepStatus(3, '\n\n50%%', DEFAULT_REFERENCE_OPTIONS)).toBe(`Label 3: ${HINT}\n\n50%`)
  })

  it('words the missing label by direction', () => {
    expect(noCandidateStatus('backward', -2, '', DEFAULT_REFERENCE_OPTIONS)).toBe(
      `No previous label. Label -2: ${HINT}`,
    )
    expect(noCandidateStatus('forward', 0, '', DEFAULT_REFERENCE_OPTIONS)).toBe(
      `No next label. Label 0: ${HINT}`,
    )
  })
})
