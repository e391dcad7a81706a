import * as monaco from 'monaco-editor'
import { InvalidChoiceError } from '../reference/errors'
import { type ReferenceOptions, resolveReferenceOptions } from '../reference/options'
import { PositionHistory } from '../reference/position-history'
import { runReferenceCycle } from '../reference/run-reference-cycle'
import type { SessionRequest } from '../reference/types'
import { EditorKeySource, type KeyEventSource } from './key-source'
import { type HostEditor, MonacoReferenceHost, type ReferenceModel } from './monaco-host'
import { ensureReferenceStyles } from './setup'
import { type OverlayHost, StatusWidget } from './status-widget'

/** How long a failure message stays in the status overlay */
const STATUS_LINGER_MS = 4000

export interface ReferenceAction {
  id: string
  label: string
  keybindings?: number[]
  run(): void | Promise<void>
}

/** The editor surface the reference commands need; any Monaco code editor provides it */
export interface ReferenceEditor extends HostEditor, KeyEventSource, OverlayHost {
  getModel(): ReferenceModel | null
  getPosition(): monaco.Position | null
  focus(): void
  addAction(action: ReferenceAction): monaco.IDisposable
}

export interface ReferenceCommandOptions extends ReferenceOptions {
  /** Keybinding of the prompting insert command. Defaults to Ctrl/Cmd+Alt+R. */
  keybinding?: number
  /** Receives status text. Defaults to an overlay in the editor's bottom-right corner. */
  onStatus?: (text: string) => void
  /** How many origins "Return to Reference Origin" remembers. Defaults to 16. */
  historyLimit?: number
}

/**
 * Register the reference commands on an editor:
 * - `latex.insert-reference` prompts for a direction first,
 * - `latex.insert-reference-backward` / `-forward` start stepping right away,
 * - `latex.insert-label-identifier` inserts a bare identifier instead of `\ref{}`,
 * - `latex.return-to-reference-origin` jumps back to where the last session started.
 */
export function registerReferenceCommands(
  editor: ReferenceEditor,
  options: ReferenceCommandOptions = {},
): monaco.IDisposable[] {
  const refOptions = resolveReferenceOptions(options)
  ensureReferenceStyles()

  const history = new PositionHistory(options.historyLimit)
  const widget = options.onStatus ? null : new StatusWidget(editor)
  const onStatus = options.onStatus ?? ((text: string) => widget?.show(text))
  let running = false

  const runSession = async (request: Omit<SessionRequest, 'origin'>): Promise<void> => {
    const model = editor.getModel()
    const position = editor.getPosition()
    if (running || !model || !position) return

    running = true
    // One undo step for the whole session
    model.pushStackElement()
    const host = new MonacoReferenceHost(editor, model, history, onStatus)
    const keys = new EditorKeySource(editor)
    try {
      await runReferenceCycle(
        host,
        keys,
        { ...request, origin: model.getOffsetAt(position) },
        refOptions,
      )
      widget?.hide()
    } catch (err) {
      if (err instanceof InvalidChoiceError) {
        onStatus(err.message)
      } else {
        console.error('Reference insertion failed:', err)
        onStatus(`Reference insertion failed: ${String(err)}`)
      }
      widget?.hideAfter(STATUS_LINGER_MS)
    } finally {
      keys.close()
      host.dispose()
      model.pushStackElement()
      running = false
    }
  }

  const returnToOrigin = (): void => {
    const model = editor.getModel()
    const offset = history.pop()
    if (!model || offset === undefined) return
    const pos = model.getPositionAt(offset)
    editor.setPosition(pos)
    editor.revealPositionInCenterIfOutsideViewport(pos)
    editor.focus()
  }

  const disposables: monaco.IDisposable[] = [
    editor.addAction({
      id: 'latex.insert-reference',
      label: 'Insert Reference to Nearby Label',
      keybindings: [
        options.keybinding ?? monaco.KeyMod.CtrlCmd | monaco.KeyMod.Alt | monaco.KeyCode.KeyR,
      ],
      run: () => runSession({}),
    }),
    editor.addAction({
      id: 'latex.insert-reference-backward',
      label: 'Insert Reference to Previous Label',
      run: () => runSession({ direction: 'backward' }),
    }),
    editor.addAction({
      id: 'latex.insert-reference-forward',
      label: 'Insert Reference to Next Label',
      run: () => runSession({ direction: 'forward' }),
    }),
    editor.addAction({
      id: 'latex.insert-label-identifier',
      label: 'Insert Nearby Label Identifier',
      run: () => runSession({ onlyIdentifier: true }),
    }),
    editor.addAction({
      id: 'latex.return-to-reference-origin',
      label: 'Return to Reference Origin',
      run: returnToOrigin,
    }),
  ]
  if (widget) disposables.push(widget)
  return disposables
}
