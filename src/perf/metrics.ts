/** Lightweight timing collector.
 *
 * Records named spans (mark → end) and exposes the last timing per span.
 * Sessions record `label-scan` for every step and `reference-session` for
 * the whole interaction.
 */

export interface SpanTiming {
  name: string
  ms: number
}

type SpanListener = (span: SpanTiming) => void

export class PerfMetrics {
  private marks = new Map<string, number>()
  private timings = new Map<string, number>()
  private listeners = new Set<SpanListener>()

  /** Start a named span. */
  mark(name: string): void {
    this.marks.set(name, performance.now())
  }

  /** End a named span and record its duration. Returns ms elapsed. */
  end(name: string): number {
    const start = this.marks.get(name)
    if (start === undefined) return 0
    const ms = performance.now() - start
    this.marks.delete(name)
    this.timings.set(name, ms)
    const span = { name, ms }
    for (const fn of this.listeners) fn(span)
    return ms
  }

  /** Get last recorded duration for a span. */
  get(name: string): number | undefined {
    return this.timings.get(name)
  }

  /** Subscribe to span completions. Returns the unsubscribe function. */
  onSpan(fn: SpanListener): () => void {
    this.listeners.add(fn)
    return () => this.listeners.delete(fn)
  }
}

/** Singleton metrics instance. */
export const perf = new PerfMetrics()
