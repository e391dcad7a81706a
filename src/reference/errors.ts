export type CycleErrorCode = 'invalid-choice' | 'scan-failure' | 'invalid-options'

export class CycleError extends Error {
  constructor(
    readonly code: CycleErrorCode,
    message: string,
  ) {
    super(message)
    this.name = new.target.name
  }
}

/** The direction prompt received a key that is neither the previous nor the next key */
export class InvalidChoiceError extends CycleError {
  constructor(readonly key: string) {
    super('invalid-choice', `Invalid direction key: ${JSON.stringify(key)}`)
  }
}

/** A label match whose argument could not be extracted */
export class ScanError extends CycleError {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super('scan-failure', message)
  }
}

export class ReferenceOptionsError extends CycleError {
  constructor(message: string) {
    super('invalid-options', message)
  }
}

export function isCycleError(err: unknown): err is CycleError {
  return err instanceof CycleError
}
