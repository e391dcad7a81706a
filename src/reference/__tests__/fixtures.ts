import { TextReferenceHost } from '../../document/text-host'
import type { Region } from '../types'

/** Split a source where `|` marks the cursor into text and origin */
export function withCursor(source: string): { text: string; origin: number } {
  const origin = source.indexOf('|')
  if (origin < 0) throw new Error(`No cursor marker in ${JSON.stringify(source)}`)
  return { text: source.slice(0, origin) + source.slice(origin + 1), origin }
}

export function hostAt(source: string): { host: TextReferenceHost; text: string; origin: number } {
  const { text, origin } = withCursor(source)
  return { host: TextReferenceHost.fromText(text, origin), text, origin }
}

export function textOf(host: TextReferenceHost, region: Region | null | undefined): string | null {
  return region ? host.text.slice(region.start, region.end) : null
}
