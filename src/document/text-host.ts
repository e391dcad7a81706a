import { PositionHistory } from '../reference/position-history'
import type {
  DocumentView,
  HighlightHandle,
  HighlightStyle,
  Position,
  ReferenceHost,
  Region,
} from '../reference/types'
import { TextDocument } from './text-document'

export interface RecordedHighlight {
  region: Region
  style: HighlightStyle
}

/**
 * Host over a TextDocument that records everything the session shows.
 * Folded regions can be declared so that `revealIfHidden` unfolds them.
 */
export class TextReferenceHost implements ReferenceHost {
  readonly history: PositionHistory
  readonly statuses: string[] = []
  readonly forwarded: string[] = []
  readonly revealed: Position[] = []
  readonly highlights = new Map<string, RecordedHighlight>()
  private folded: Region[] = []
  private openClones = new Set<DocumentView>()
  private nextHighlightId = 1

  constructor(
    readonly buffer: TextDocument,
    { historyLimit }: { historyLimit?: number } = {},
  ) {
    this.history = new PositionHistory(historyLimit)
  }

  static fromText(text: string, cursor?: Position): TextReferenceHost {
    return new TextReferenceHost(new TextDocument(text, cursor))
  }

  get text(): string {
    return this.buffer.getText()
  }

  get cursor(): Position {
    return this.buffer.cursor
  }

  get lastStatus(): string | undefined {
    return this.statuses[this.statuses.length - 1]
  }

  /** Number of clones handed out and not yet closed */
  get openCloneCount(): number {
    return this.openClones.size
  }

  fold(region: Region): void {
    this.folded.push(region)
  }

  isHidden(position: Position): boolean {
    return this.folded.some((r) => position > r.start && position < r.end)
  }

  highlightsOf(style: HighlightStyle): Region[] {
    return [...this.highlights.values()].filter((h) => h.style === style).map((h) => h.region)
  }

  // --- ReferenceHost ---

  cloneDocumentReadOnly(): DocumentView {
    const clone = this.buffer.clone()
    this.openClones.add(clone)
    return clone
  }

  closeDocument(doc: DocumentView): void {
    if (!this.openClones.delete(doc)) {
      throw new Error('Document clone was already closed')
    }
  }

  revealIfHidden(position: Position): void {
    const before = this.folded.length
    this.folded = this.folded.filter((r) => !(position > r.start && position < r.end))
    if (this.folded.length !== before) this.revealed.push(position)
  }

  pushPositionHistory(position: Position): void {
    this.history.push(position)
  }

  showStatus(text: string): void {
    this.statuses.push(text)
  }

  highlight(region: Region, style: HighlightStyle): HighlightHandle {
    const id = `hl-${this.nextHighlightId++}`
    this.highlights.set(id, { region: { ...region }, style })
    return { id }
  }

  clearHighlight(handle: HighlightHandle): void {
    this.highlights.delete(handle.id)
  }

  /** Default input handling: type the key at the cursor */
  forwardInput(key: string): void {
    this.forwarded.push(key)
    this.buffer.release(this.buffer.insert(this.buffer.cursor, key))
  }
}
