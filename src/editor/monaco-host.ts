import * as monaco from 'monaco-editor'
import { TextDocument } from '../document/text-document'
import type { PositionHistory } from '../reference/position-history'
import type {
  DocumentView,
  EditBuffer,
  HighlightHandle,
  HighlightStyle,
  Marker,
  Position,
  ReferenceHost,
  Region,
} from '../reference/types'
import { HIGHLIGHT_CLASS } from './setup'

/** Model operations the reference host relies on */
export type ReferenceModel = Pick<
  monaco.editor.ITextModel,
  | 'getValue'
  | 'getOffsetAt'
  | 'getPositionAt'
  | 'pushEditOperations'
  | 'pushStackElement'
  | 'deltaDecorations'
  | 'getDecorationRange'
>

/** Editor operations the reference host relies on */
export type HostEditor = Pick<
  monaco.editor.ICodeEditor,
  'setPosition' | 'trigger' | 'revealPositionInCenterIfOutsideViewport'
>

const MARKER_OPTIONS: monaco.editor.IModelDecorationOptions = {
  description: 'latex-reference-marker',
  stickiness: monaco.editor.TrackedRangeStickiness.AlwaysGrowsWhenTypingAtEdges,
}

function toRange(model: ReferenceModel, start: Position, end: Position): monaco.Range {
  return monaco.Range.fromPositions(model.getPositionAt(start), model.getPositionAt(end))
}

/** Marker backed by a model decoration, which Monaco keeps in place across edits */
class DecorationMarker implements Marker {
  constructor(
    private model: ReferenceModel,
    public decorationId: string,
  ) {}

  get start(): Position {
    return this.model.getOffsetAt(this.range().getStartPosition())
  }

  get end(): Position {
    return this.model.getOffsetAt(this.range().getEndPosition())
  }

  range(): monaco.Range {
    const range = this.model.getDecorationRange(this.decorationId)
    if (!range) throw new Error(`Marker ${this.decorationId} was released`)
    return range
  }
}

export class MonacoEditBuffer implements EditBuffer {
  constructor(
    private editor: HostEditor,
    private model: ReferenceModel,
  ) {}

  insert(position: Position, text: string): Marker {
    const at = this.model.getPositionAt(position)
    this.applyEdit(monaco.Range.fromPositions(at), text)
    const start = this.model.getOffsetAt(at)
    return this.mark({ start, end: start + text.length })
  }

  mark(region: Region): Marker {
    return new DecorationMarker(this.model, this.decorate(region))
  }

  replace(marker: Marker, text: string): void {
    const owned = this.own(marker)
    const start = owned.start
    this.applyEdit(owned.range(), text)
    // Pin the marker to exactly the new text, whatever the stickiness did
    const [id] = this.model.deltaDecorations(
      [owned.decorationId],
      [{ range: toRange(this.model, start, start + text.length), options: MARKER_OPTIONS }],
    )
    if (id === undefined) throw new Error('Monaco did not return a decoration id')
    owned.decorationId = id
  }

  release(marker: Marker): void {
    this.model.deltaDecorations([this.own(marker).decorationId], [])
  }

  setCursor(position: Position): void {
    this.editor.setPosition(this.model.getPositionAt(position))
  }

  private decorate(region: Region): string {
    const [id] = this.model.deltaDecorations(
      [],
      [{ range: toRange(this.model, region.start, region.end), options: MARKER_OPTIONS }],
    )
    if (id === undefined) throw new Error('Monaco did not return a decoration id')
    return id
  }

  private applyEdit(range: monaco.IRange, text: string): void {
    this.model.pushEditOperations([], [{ range, text }], () => null)
  }

  private own(marker: Marker): DecorationMarker {
    if (marker instanceof DecorationMarker) return marker
    throw new Error('Marker was not created by this buffer')
  }
}

/**
 * Host binding a session to a Monaco editor. Scanning happens on a plain-text
 * snapshot of the model, so visual lines are the model's lines.
 */
export class MonacoReferenceHost implements ReferenceHost {
  readonly buffer: MonacoEditBuffer
  private clones = new Set<DocumentView>()

  constructor(
    private editor: HostEditor,
    private model: ReferenceModel,
    private history: PositionHistory,
    private onStatus: (text: string) => void,
  ) {
    this.buffer = new MonacoEditBuffer(editor, model)
  }

  cloneDocumentReadOnly(): DocumentView {
    const clone = new TextDocument(this.model.getValue())
    this.clones.add(clone)
    return clone
  }

  closeDocument(doc: DocumentView): void {
    this.clones.delete(doc)
  }

  revealIfHidden(position: Position): void {
    const pos = this.model.getPositionAt(position)
    this.editor.trigger('latex-reference', 'editor.unfold', {
      selectionLines: [pos.lineNumber - 1],
    })
    this.editor.revealPositionInCenterIfOutsideViewport(pos)
  }

  pushPositionHistory(position: Position): void {
    this.history.push(position)
  }

  showStatus(text: string): void {
    this.onStatus(text)
  }

  highlight(region: Region, style: HighlightStyle): HighlightHandle {
    const [id] = this.model.deltaDecorations(
      [],
      [
        {
          range: toRange(this.model, region.start, region.end),
          options: {
            description: `latex-reference-${style}`,
            className: HIGHLIGHT_CLASS[style],
            stickiness: monaco.editor.TrackedRangeStickiness.NeverGrowsWhenTypingAtEdges,
          },
        },
      ],
    )
    if (id === undefined) throw new Error('Monaco did not return a decoration id')
    return { id }
  }

  clearHighlight(handle: HighlightHandle): void {
    this.model.deltaDecorations([handle.id], [])
  }

  forwardInput(key: string): void {
    // Typed input gets its own undo step
    this.model.pushStackElement()
    this.editor.trigger('keyboard', 'type', { text: key })
  }

  dispose(): void {
    if (this.clones.size > 0) {
      console.warn(`[latex-reference] ${this.clones.size} document snapshot(s) were never closed`)
      this.clones.clear()
    }
  }
}
