import * as monaco from 'monaco-editor'

export type OverlayHost = Pick<
  monaco.editor.ICodeEditor,
  'addOverlayWidget' | 'layoutOverlayWidget' | 'removeOverlayWidget'
>

/** Overlay in the editor's bottom-right corner showing the session's status text */
export class StatusWidget implements monaco.editor.IOverlayWidget {
  private node: HTMLElement
  private hideTimer: ReturnType<typeof setTimeout> | null = null

  constructor(private editor: OverlayHost) {
    this.node = document.createElement('div')
    this.node.className = 'latex-reference-status'
    this.node.style.display = 'none'
    editor.addOverlayWidget(this)
  }

  getId(): string {
    return 'latex.reference.status'
  }

  getDomNode(): HTMLElement {
    return this.node
  }

  getPosition(): monaco.editor.IOverlayWidgetPosition {
    return { preference: monaco.editor.OverlayWidgetPositionPreference.BOTTOM_RIGHT_CORNER }
  }

  show(text: string): void {
    this.cancelHide()
    this.node.textContent = text
    this.node.style.display = ''
    this.editor.layoutOverlayWidget(this)
  }

  hide(): void {
    this.cancelHide()
    this.node.style.display = 'none'
  }

  /** Keep the current text up for `ms`, then hide it unless something else is shown */
  hideAfter(ms: number): void {
    this.cancelHide()
    this.hideTimer = setTimeout(() => this.hide(), ms)
  }

  dispose(): void {
    this.cancelHide()
    this.editor.removeOverlayWidget(this)
  }

  private cancelHide(): void {
    if (this.hideTimer !== null) {
      clearTimeout(this.hideTimer)
      this.hideTimer = null
    }
  }
}
