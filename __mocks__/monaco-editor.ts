// Run-time stand-in for the parts of monaco-editor the editor adapter touches,
// so adapter tests run under Node. Types still come from the real package.

interface IPosition {
  lineNumber: number
  column: number
}

export class Position {
  constructor(
    readonly lineNumber: number,
    readonly column: number,
  ) {}
}

export class Range {
  constructor(
    readonly startLineNumber: number,
    readonly startColumn: number,
    readonly endLineNumber: number,
    readonly endColumn: number,
  ) {}

  static fromPositions(start: IPosition, end: IPosition = start): Range {
    return new Range(start.lineNumber, start.column, end.lineNumber, end.column)
  }

  getStartPosition(): Position {
    return new Position(this.startLineNumber, this.startColumn)
  }

  getEndPosition(): Position {
    return new Position(this.endLineNumber, this.endColumn)
  }
}

export const KeyMod = { CtrlCmd: 2048, Shift: 1024, Alt: 512, WinCtrl: 256 }

export const KeyCode = { KeyR: 48 }

export const editor = {
  TrackedRangeStickiness: {
    AlwaysGrowsWhenTypingAtEdges: 0,
    NeverGrowsWhenTypingAtEdges: 1,
    GrowsOnlyWhenTypingBefore: 2,
    GrowsOnlyWhenTypingAfter: 3,
  },
  OverlayWidgetPositionPreference: {
    TOP_RIGHT_CORNER: 0,
    BOTTOM_RIGHT_CORNER: 1,
    TOP_CENTER: 2,
  },
}
