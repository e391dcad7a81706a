import type * as Monaco from 'monaco-editor'
import { chordName } from '../reference/keys'
import type { KeySource } from '../reference/run-reference-cycle'

interface Waiter {
  resolve: (key: string) => void
  reject: (err: Error) => void
}

/** The parts of Monaco's keyboard event a session reads */
export interface KeyPress {
  readonly browserEvent: { readonly key: string }
  readonly ctrlKey: boolean
  readonly altKey: boolean
  readonly metaKey: boolean
  readonly altGraphKey: boolean
  preventDefault(): void
  stopPropagation(): void
}

/** Keyboard and lifecycle events of a code editor */
export interface KeyEventSource {
  onKeyDown(listener: (e: KeyPress) => void): Monaco.IDisposable
  onDidChangeModel(listener: () => void): Monaco.IDisposable
  onDidDispose(listener: () => void): Monaco.IDisposable
}

/**
 * Captures every key pressed in the editor while a session runs, so none of them
 * reaches Monaco's own handling. Closing it fails the pending read.
 */
export class EditorKeySource implements KeySource {
  private queue: string[] = []
  private waiter: Waiter | null = null
  private closedReason: string | null = null
  private disposables: Monaco.IDisposable[]

  constructor(editor: KeyEventSource) {
    this.disposables = [
      editor.onKeyDown((e) => {
        e.preventDefault()
        e.stopPropagation()
        this.push(
          chordName({
            key: e.browserEvent.key,
            ctrlKey: e.ctrlKey,
            altKey: e.altKey,
            metaKey: e.metaKey,
            altGraphKey: e.altGraphKey,
          }),
        )
      }),
      editor.onDidChangeModel(() => this.close('editor model changed')),
      editor.onDidDispose(() => this.close('editor disposed')),
    ]
  }

  next(): Promise<string> {
    const queued = this.queue.shift()
    if (queued !== undefined) return Promise.resolve(queued)
    if (this.closedReason !== null) {
      return Promise.reject(new Error(`Key input closed: ${this.closedReason}`))
    }
    return new Promise<string>((resolve, reject) => {
      this.waiter = { resolve, reject }
    })
  }

  close(reason = 'session finished'): void {
    if (this.closedReason !== null) return
    this.closedReason = reason
    for (const d of this.disposables) d.dispose()
    this.disposables = []
    const waiter = this.waiter
    this.waiter = null
    waiter?.reject(new Error(`Key input closed: ${reason}`))
  }

  private push(key: string): void {
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter.resolve(key)
    } else {
      this.queue.push(key)
    }
  }
}
