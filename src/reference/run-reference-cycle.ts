import type { PerfMetrics } from '../perf/metrics'
import type { ReferenceOptions } from './options'
import { ReferenceSession } from './reference-session'
import type { ReferenceHost, SessionRequest, SessionState } from './types'

/** Delivers one key at a time; rejects when input can no longer be read */
export interface KeySource {
  next(): Promise<string>
}

/**
 * Run a session to completion, waiting on `keys` between steps.
 * Rejects with `InvalidChoiceError` for a bad direction key. If reading a key
 * fails, the session is aborted (insertion rolled back) before the error propagates.
 */
export async function runReferenceCycle(
  host: ReferenceHost,
  keys: KeySource,
  request: SessionRequest,
  options?: ReferenceOptions,
  metrics?: PerfMetrics,
): Promise<SessionState> {
  const session = new ReferenceSession(host, options, metrics)
  session.start(request)

  while (session.active) {
    let key: string
    try {
      key = await keys.next()
    } catch (err) {
      session.abort()
      throw err
    }
    session.dispatch(key)
  }
  return session.state
}
