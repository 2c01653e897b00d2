export type ProtocolViolationCode =
  | 'FINGERPRINT_MISMATCH'
  | 'MALFORMED_USER_PAYLOAD'
  | 'INVALID_MESSAGE'
  | 'UNEXPECTED_OPCODE'
  | 'CONNECTION_CLOSED'

/** The gateway broke the handshake contract. Triggers a reconnect. */
export class ProtocolViolation extends Error {
  constructor(
    public readonly code: ProtocolViolationCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'ProtocolViolation'
  }
}

/** The gateway socket could not be established. */
export class ConnectError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConnectError'
  }
}

/** A heartbeat went unacknowledged until the next beat was due. */
export class LivenessFailure extends Error {
  constructor(public readonly intervalMs: number) {
    super(`Heartbeat not acknowledged within ${intervalMs}ms`)
    this.name = 'LivenessFailure'
  }
}

/** The caller's attempt budget ran out before a login completed. */
export class RetryBudgetExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastReason: Error,
  ) {
    super(`Gave up after ${attempts} failed attempts: ${lastReason.message}`, { cause: lastReason })
    this.name = 'RetryBudgetExhaustedError'
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
