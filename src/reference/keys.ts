import type { ResolvedReferenceOptions } from './options'

export type KeyAction =
  | { type: 'previous' }
  | { type: 'next' }
  | { type: 'goto' }
  | { type: 'other'; key: string; printable: boolean }
  | { type: 'ignore' }

/** Keys that only change the meaning of the next key */
const MODIFIER_KEYS = new Set(['Shift', 'Control', 'Alt', 'AltGraph', 'Meta', 'CapsLock', 'Fn'])

/** A single character a text input would insert (keyboard `key` values name everything else) */
export function isPrintableKey(key: string): boolean {
  return [...key].length === 1
}

/** The parts of a keydown event that name a key press */
export interface KeyChord {
  key: string
  ctrlKey: boolean
  altKey: boolean
  metaKey: boolean
  altGraphKey?: boolean
}

/**
 * Name of a key press as a session sees it. Keys held with Ctrl, Alt or Meta are
 * prefixed (`Ctrl+s`, `Alt+ArrowDown`), so a shortcut never reads as a typed
 * character. AltGr input keeps the character it produces.
 */
export function chordName(chord: KeyChord): string {
  if (chord.altGraphKey || MODIFIER_KEYS.has(chord.key)) return chord.key
  let name = chord.key
  if (chord.metaKey) name = `Meta+${name}`
  if (chord.altKey) name = `Alt+${name}`
  if (chord.ctrlKey) name = `Ctrl+${name}`
  return name
}

export function classifyKey(key: string, options: ResolvedReferenceOptions): KeyAction {
  if (key === options.previousKey) return { type: 'previous' }
  if (key === options.nextKey) return { type: 'next' }
  if (key === options.gotoKey) return { type: 'goto' }
  if (MODIFIER_KEYS.has(key)) return { type: 'ignore' }
  return { type: 'other', key, printable: isPrintableKey(key) }
}
