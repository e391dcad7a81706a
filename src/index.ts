export { TextDocument } from './document/text-document'
export { TextReferenceHost } from './document/text-host'
export {
  type ReferenceCommandOptions,
  type ReferenceEditor,
  registerReferenceCommands,
} from './editor/reference-commands'
export { ensureReferenceStyles } from './editor/setup'
export { perf } from './perf/metrics'
export { findNext } from './reference/anchor-scanner'
export { EditTransaction } from './reference/edit-transaction'
export {
  CycleError,
  InvalidChoiceError,
  ReferenceOptionsError,
  ScanError,
  isCycleError,
} from './reference/errors'
export {
  DEFAULT_REFERENCE_OPTIONS,
  type ReferenceOptions,
  resolveReferenceOptions,
} from './reference/options'
export { PositionHistory } from './reference/position-history'
export { ReferenceSession } from './reference/reference-session'
export { type KeySource, runReferenceCycle } from './reference/run-reference-cycle'
export type {
  Anchor,
  AnchorMatch,
  DocumentView,
  EditBuffer,
  HighlightHandle,
  HighlightStyle,
  Marker,
  Position,
  ReferenceHost,
  Region,
  SearchDirection,
  SessionOutcome,
  SessionPhase,
  SessionRequest,
  SessionState,
} from './reference/types'
