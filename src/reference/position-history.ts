import type { Position } from './types'

/** Bounded stack of positions the author may want to return to */
export class PositionHistory {
  private entries: Position[] = []

  constructor(private limit = 16) {}

  push(position: Position): void {
    this.entries.push(position)
    if (this.entries.length > this.limit) this.entries.shift()
  }

  pop(): Position | undefined {
    return this.entries.pop()
  }

  peek(): Position | undefined {
    return this.entries[this.entries.length - 1]
  }

  get size(): number {
    return this.entries.length
  }

  clear(): void {
    this.entries = []
  }
}
