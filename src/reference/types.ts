/** Zero-based character offset into a document */
export type Position = number

/** Half-open offset range `[start, end)` */
export interface Region {
  start: Position
  end: Position
}

export type SearchDirection = 'backward' | 'forward'

export interface Anchor {
  identifier: string
  /** The bracketed argument, braces included */
  span: Region
}

export interface AnchorMatch {
  anchor: Anchor
  /** The whole `\label{...}` construct */
  match: Region
  /** Surrounding lines for display, or '' when context is disabled */
  context: string
}

export interface SearchMatch {
  start: Position
  end: Position
  text: string
}

/** Read-only view of a document, used for scanning */
export interface DocumentView {
  readonly length: number
  getText(start?: Position, end?: Position): string
  /**
   * Forward: first match starting at or after `from`.
   * Backward: last match ending at or before `from`.
   */
  searchPattern(from: Position, direction: SearchDirection, pattern: RegExp): SearchMatch | null
  isInComment(position: Position): boolean
  isEscaped(position: Position): boolean
  /** Start of the visual line `offsetLines` away from the one holding `position` */
  visualLineStart(position: Position, offsetLines: number): Position
  /** End of the visual line `offsetLines` away from the one holding `position` */
  visualLineEnd(position: Position, offsetLines: number): Position
}

/** A region that stays valid while the surrounding text changes */
export interface Marker {
  readonly start: Position
  readonly end: Position
}

export interface EditBuffer {
  insert(position: Position, text: string): Marker
  mark(region: Region): Marker
  replace(marker: Marker, text: string): void
  release(marker: Marker): void
  setCursor(position: Position): void
}

export type HighlightStyle = 'live' | 'target'

export interface HighlightHandle {
  readonly id: string
}

/** Collaborators supplied by the editing environment */
export interface ReferenceHost {
  readonly buffer: EditBuffer
  cloneDocumentReadOnly(): DocumentView
  closeDocument(doc: DocumentView): void
  revealIfHidden(position: Position): void
  pushPositionHistory(position: Position): void
  showStatus(text: string): void
  highlight(region: Region, style: HighlightStyle): HighlightHandle
  clearHighlight(handle: HighlightHandle): void
  /** Hand a key back to the host's default input handling */
  forwardInput(key: string): void
}

export type SessionPhase = 'idle' | 'awaiting-direction' | 'stepping' | 'terminated'

export type SessionOutcome = 'accepted' | 'navigated' | 'invalid-choice' | 'failed'

export interface SessionRequest {
  origin: Position
  direction?: SearchDirection
  onlyIdentifier?: boolean
}

export interface SessionState {
  phase: SessionPhase
  origin: Position
  direction: SearchDirection
  /** 0 until the first successful step, then never 0 again */
  stepIndex: number
  liveRegion: Region | null
  identifierRegion: Region | null
  insertOnlyIdentifier: boolean
  active: boolean
  current: Anchor | null
  outcome: SessionOutcome | null
}
