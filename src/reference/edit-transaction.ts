import type { EditBuffer, Marker, Position, Region } from './types'

type TransactionState = 'open' | 'committed' | 'rolled-back'

function snapshot(marker: Marker): Region {
  return { start: marker.start, end: marker.end }
}

/**
 * Speculative insertion owned by one session. Content is rewritten in place
 * while open, then either kept (`commit`) or removed entirely (`rollback`).
 */
export class EditTransaction {
  private state: TransactionState = 'open'
  private closed: { live: Region; identifier: Region | null } | null = null

  private constructor(
    private buffer: EditBuffer,
    private live: Marker,
    private identifier: Marker | null,
  ) {}

  /**
   * Insert `text` at `position`. When `identifierOffset` is given, the empty region at
   * that offset inside `text` is what `setContent` rewrites; otherwise the whole insertion is.
   */
  static open(
    buffer: EditBuffer,
    position: Position,
    text: string,
    identifierOffset: number | null = null,
  ): EditTransaction {
    const live = buffer.insert(position, text)
    const identifier =
      identifierOffset === null
        ? null
        : buffer.mark({ start: live.start + identifierOffset, end: live.start + identifierOffset })
    return new EditTransaction(buffer, live, identifier)
  }

  get isOpen(): boolean {
    return this.state === 'open'
  }

  /** The inserted text's region; frozen once the transaction is closed */
  get region(): Region {
    return this.closed ? this.closed.live : snapshot(this.live)
  }

  get identifierRegion(): Region | null {
    if (this.closed) return this.closed.identifier
    return this.identifier ? snapshot(this.identifier) : null
  }

  setContent(text: string): void {
    this.assertOpen('setContent')
    this.buffer.replace(this.identifier ?? this.live, text)
  }

  commit(): void {
    this.assertOpen('commit')
    this.state = 'committed'
    this.releaseMarkers()
  }

  rollback(): void {
    this.assertOpen('rollback')
    this.buffer.replace(this.live, '')
    this.state = 'rolled-back'
    this.releaseMarkers()
  }

  private releaseMarkers(): void {
    this.closed = { live: snapshot(this.live), identifier: this.identifierRegion }
    if (this.identifier) this.buffer.release(this.identifier)
    this.buffer.release(this.live)
  }

  private assertOpen(op: string): void {
    if (this.state !== 'open') {
      throw new Error(`Cannot ${op}: transaction already ${this.state}`)
    }
  }
}
