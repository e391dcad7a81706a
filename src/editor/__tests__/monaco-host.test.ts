import { afterEach, describe, expect, it, vi } from 'vitest'
import { PositionHistory } from '../../reference/position-history'
import { MonacoEditBuffer, MonacoReferenceHost } from '../monaco-host'
import { FakeEditor, FakeModel } from './fake-editor'

vi.mock('monaco-editor')

afterEach(() => {
  vi.restoreAllMocks()
})

function bufferFor(text: string) {
  const model = new FakeModel(text)
  return { model, buffer: new MonacoEditBuffer(new FakeEditor(model), model) }
}

describe('MonacoEditBuffer', () => {
  it('pins an empty marker to its replacement text', () => {
    const { model, buffer } = bufferFor('ab')
    const marker = buffer.mark({ start: 1, end: 1 })
    buffer.replace(marker, 'xyz')
    expect(model.getValue()).toBe('axyzb')
    expect([marker.start, marker.end]).toEqual([1, 4])

    buffer.replace(marker, 'q')
    expect(model.getValue()).toBe('aqb')
    expect([marker.start, marker.end]).toEqual([1, 2])
  })

  it('returns a marker over inserted text and grows markers around it', () => {
    const { model, buffer } = bufferFor('ab')
    const outer = buffer.mark({ start: 0, end: 2 })
    const inserted = buffer.insert(1, '--')
    expect(model.getValue()).toBe('a--b')
    expect([inserted.start, inserted.end]).toEqual([1, 3])
    expect([outer.start, outer.end]).toEqual([0, 4])
  })

  it('forgets released markers', () => {
    const { model, buffer } = bufferFor('ab')
    const marker = buffer.mark({ start: 0, end: 1 })
    buffer.release(marker)
    expect(model.decorations.size).toBe(0)
    expect(() => marker.start).toThrow('was released')
  })

  it('moves the cursor', () => {
    const model = new FakeModel('one\ntwo')
    const editor = new FakeEditor(model)
    new MonacoEditBuffer(editor, model).setCursor(5)
    expect(editor.getPosition()).toEqual({ lineNumber: 2, column: 2 })
  })
})

describe('MonacoReferenceHost', () => {
  function hostFor(text: string) {
    const model = new FakeModel(text)
    const editor = new FakeEditor(model)
    const statuses: string[] = []
    const history = new PositionHistory()
    const host = new MonacoReferenceHost(editor, model, history, (t) => statuses.push(t))
    return { model, editor, host, history, statuses }
  }

  it('scans a snapshot of the model', () => {
    const { model, host } = hostFor('\\label{a}')
    const clone = host.cloneDocumentReadOnly()
    host.buffer.insert(0, 'x')
    expect(clone.getText()).toBe('\\label{a}')
    expect(model.getValue()).toBe('x\\label{a}')
    host.closeDocument(clone)
  })

  it('warns about snapshots left open', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { host } = hostFor('text')
    host.cloneDocumentReadOnly()
    host.dispose()
    expect(warn).toHaveBeenCalledWith('[latex-reference] 1 document snapshot(s) were never closed')
  })

  it('unfolds and reveals a position', () => {
    const { editor, host } = hostFor('a\nbc')
    host.revealIfHidden(3)
    expect(editor.triggered).toEqual([
      { source: 'latex-reference', handlerId: 'editor.unfold', payload: { selectionLines: [1] } },
    ])
    expect(editor.revealed).toEqual([{ lineNumber: 2, column: 2 }])
  })

  it('highlights with a styled decoration and clears it', () => {
    const { model, host } = hostFor('\\label{a}')
    const handle = host.highlight({ start: 6, end: 9 }, 'target')
    expect(model.decorations.get(handle.id)?.options.className).toBe('latex-reference-target')
    host.clearHighlight(handle)
    expect(model.decorations.size).toBe(0)
  })

  it('types forwarded keys as their own undo step', () => {
    const { model, editor, host } = hostFor('text')
    host.forwardInput('x')
    expect(model.undoStops).toBe(1)
    expect(editor.typed()).toEqual([{ text: 'x' }])
  })

  it('routes status text and history', () => {
    const { host, history, statuses } = hostFor('text')
    host.showStatus('Label 1')
    host.pushPositionHistory(3)
    expect(statuses).toEqual(['Label 1'])
    expect(history.peek()).toBe(3)
  })
})
