import { referenceSkeleton } from '../latex/latex-patterns'
import { type PerfMetrics, perf } from '../perf/metrics'
import { cursorAfter, findNext } from './anchor-scanner'
import { EditTransaction } from './edit-transaction'
import { InvalidChoiceError, ScanError } from './errors'
import { type KeyAction, classifyKey } from './keys'
import {
  type ReferenceOptions,
  type ResolvedReferenceOptions,
  resolveReferenceOptions,
} from './options'
import { isInReferenceArgument } from './reference-context'
import { directionPrompt, noCandidateStatus, stepStatus } from './status'
import type {
  AnchorMatch,
  DocumentView,
  HighlightHandle,
  Position,
  ReferenceHost,
  Region,
  SearchDirection,
  SessionOutcome,
  SessionPhase,
  SessionRequest,
  SessionState,
} from './types'

/** Step counter that never lands on 0 once a step has succeeded */
export function nextStepIndex(index: number, direction: SearchDirection): number {
  const next = direction === 'forward' ? index + 1 : index - 1
  if (next !== 0) return next
  return direction === 'forward' ? 1 : -1
}

/**
 * One interactive "insert reference" interaction.
 *
 * The session inserts a live reference at the origin and rewrites it while the
 * author steps through labels with the previous/next keys. The goto key removes
 * the insertion and jumps to the proposed label; any other key keeps the text.
 * Scanning runs on a read-only clone taken before the insertion, so scratch
 * positions equal real positions once the insertion is rolled back.
 *
 * Drive it with `start()` and then one `dispatch(key)` per key press until
 * `active` turns false.
 */
export class ReferenceSession {
  private opts: ResolvedReferenceOptions

  private phase: SessionPhase = 'idle'
  private outcome: SessionOutcome | null = null
  private origin: Position = 0
  private direction: SearchDirection = 'forward'
  private stepIndex = 0
  private insertOnlyIdentifier = false

  private scratch: DocumentView | null = null
  private scratchCursor: Position = 0
  private transaction: EditTransaction | null = null
  private current: AnchorMatch | null = null
  private context = ''

  private liveHighlight: HighlightHandle | null = null
  private targetHighlight: HighlightHandle | null = null

  constructor(
    private host: ReferenceHost,
    options?: ReferenceOptions,
    private metrics: PerfMetrics = perf,
  ) {
    this.opts = resolveReferenceOptions(options)
  }

  get active(): boolean {
    return this.phase === 'awaiting-direction' || this.phase === 'stepping'
  }

  get state(): SessionState {
    return {
      phase: this.phase,
      origin: this.origin,
      direction: this.direction,
      stepIndex: this.stepIndex,
      liveRegion: this.transaction ? this.transaction.region : null,
      identifierRegion: this.transaction ? this.transaction.identifierRegion : null,
      insertOnlyIdentifier: this.insertOnlyIdentifier,
      active: this.active,
      current: this.current ? this.current.anchor : null,
      outcome: this.outcome,
    }
  }

  start(request: SessionRequest): SessionState {
    if (this.phase !== 'idle') {
      throw new Error(`Cannot start: session is ${this.phase}`)
    }
    this.origin = request.origin
    this.insertOnlyIdentifier = request.onlyIdentifier ?? false
    this.metrics.mark('reference-session')

    const { direction } = request
    if (direction === undefined) {
      this.phase = 'awaiting-direction'
      this.host.showStatus(directionPrompt(this.opts))
    } else {
      this.guard(() => this.enterStepping(direction))
    }
    return this.state
  }

  dispatch(key: string): SessionState {
    if (!this.active) {
      throw new Error(`Cannot dispatch ${JSON.stringify(key)}: session is ${this.phase}`)
    }
    const action = classifyKey(key, this.opts)
    if (action.type === 'ignore') return this.state

    this.guard(() => {
      if (this.phase === 'awaiting-direction') this.chooseDirection(action, key)
      else this.handleStepAction(action)
    })
    return this.state
  }

  /** Terminate abnormally: the insertion is rolled back and every resource released. */
  abort(): void {
    if (this.active) this.fail()
  }

  // --- Transitions ---

  private chooseDirection(action: KeyAction, key: string): void {
    if (action.type === 'previous') this.enterStepping('backward')
    else if (action.type === 'next') this.enterStepping('forward')
    else {
      this.finish('invalid-choice')
      throw new InvalidChoiceError(key)
    }
  }

  private enterStepping(direction: SearchDirection): void {
    this.phase = 'stepping'
    this.direction = direction
    this.host.pushPositionHistory(this.origin)

    const scratch = this.host.cloneDocumentReadOnly()
    this.scratch = scratch
    this.scratchCursor = this.origin

    if (
      !this.insertOnlyIdentifier &&
      this.opts.onlyIdentifierInArgument &&
      isInReferenceArgument(scratch, this.origin)
    ) {
      this.insertOnlyIdentifier = true
    }

    if (this.insertOnlyIdentifier) {
      this.transaction = EditTransaction.open(this.host.buffer, this.origin, ' ')
    } else {
      const { text, identifierOffset } = referenceSkeleton(this.opts.referenceCommand)
      this.transaction = EditTransaction.open(this.host.buffer, this.origin, text, identifierOffset)
    }
    this.refreshLiveHighlight()
    this.step(scratch)
  }

  private handleStepAction(action: KeyAction): void {
    this.clearTarget()
    switch (action.type) {
      case 'goto':
        this.navigate()
        break
      case 'previous':
      case 'next':
        this.direction = action.type === 'previous' ? 'backward' : 'forward'
        if (this.scratch) this.step(this.scratch)
        break
      case 'other':
        this.accept(action.printable ? action.key : null)
        break
      case 'ignore':
        break
    }
  }

  private step(scratch: DocumentView): void {
    const found = this.scan(scratch)
    if (!found) {
      this.host.showStatus(
        noCandidateStatus(this.direction, this.stepIndex, this.context, this.opts),
      )
      return
    }

    this.current = found
    this.context = found.context
    this.scratchCursor = cursorAfter(found, this.direction)
    this.stepIndex = nextStepIndex(this.stepIndex, this.direction)
    this.transaction?.setContent(found.anchor.identifier)
    this.refreshLiveHighlight()
    this.targetHighlight = this.host.highlight(this.toLiveDocument(found.anchor.span), 'target')
    this.host.showStatus(stepStatus(this.stepIndex, this.context, this.opts))
  }

  private scan(scratch: DocumentView): AnchorMatch | null {
    this.metrics.mark('label-scan')
    try {
      return findNext(scratch, this.scratchCursor, this.direction, {
        withContext: this.opts.showContext,
      })
    } catch (err) {
      if (!(err instanceof ScanError)) throw err
      console.warn('Label scan failed, treating as no candidate:', err)
      return null
    } finally {
      this.metrics.end('label-scan')
    }
  }

  private navigate(): void {
    const target = this.current ? this.current.anchor.span.end : this.origin
    this.transaction?.rollback()
    this.host.revealIfHidden(target)
    this.host.buffer.setCursor(target)
    this.finish('navigated')
  }

  private accept(forwardKey: string | null): void {
    if (this.transaction) {
      const live = this.transaction.region
      this.transaction.commit()
      this.host.buffer.setCursor(live.end)
    }
    this.finish('accepted')
    if (forwardKey !== null) this.host.forwardInput(forwardKey)
  }

  private fail(): void {
    if (this.transaction?.isOpen) {
      try {
        this.transaction.rollback()
      } catch (err) {
        console.error('Failed to roll back reference insertion:', err)
      }
    }
    this.finish('failed')
  }

  private finish(outcome: SessionOutcome): void {
    this.clearTarget()
    if (this.liveHighlight) {
      this.host.clearHighlight(this.liveHighlight)
      this.liveHighlight = null
    }
    if (this.scratch) {
      this.host.closeDocument(this.scratch)
      this.scratch = null
    }
    this.phase = 'terminated'
    this.outcome = outcome
    this.metrics.end('reference-session')
  }

  /** Release everything on any error thrown mid-session, then let it propagate */
  private guard(fn: () => void): void {
    try {
      fn()
    } catch (err) {
      if (this.active) this.fail()
      throw err
    }
  }

  // --- Highlights ---

  /** Map a scratch region into the edited document, past the live insertion */
  private toLiveDocument(region: Region): Region {
    if (!this.transaction || region.start < this.origin) return region
    const live = this.transaction.region
    const shift = live.end - live.start
    return { start: region.start + shift, end: region.end + shift }
  }

  private refreshLiveHighlight(): void {
    if (this.liveHighlight) this.host.clearHighlight(this.liveHighlight)
    this.liveHighlight = this.transaction
      ? this.host.highlight(this.transaction.region, 'live')
      : null
  }

  private clearTarget(): void {
    if (this.targetHighlight) {
      this.host.clearHighlight(this.targetHighlight)
      this.targetHighlight = null
    }
  }
}
