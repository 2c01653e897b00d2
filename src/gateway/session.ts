/**
 * Remote-auth login session: the outer retry loop and the per-connection
 * protocol state machine.
 *
 * The outer loop owns the Transport and KeyMaterial lifecycle. Every attempt
 * gets a fresh keypair and socket, runs the inner loop until it returns a
 * tagged outcome, and always closes the socket before deciding what next:
 *
 *   reconnect -> back off, start a new attempt
 *   completed -> resolve with the decrypted token
 *   cancelled -> resolve (or restart when restartOnCancel is set)
 *   aborted   -> caller's AbortSignal fired; resolve without retrying
 *   fatal     -> reject (ticket exchange or token decrypt failed)
 *
 * The inner loop races the next inbound opcode against the heartbeat's
 * liveness signal and the abort signal, handling whichever settles first.
 */

import { randomUUID } from 'node:crypto'
import type { AuditLogger, AuditEvent } from '../audit/logger.js'
import { KeyMaterial } from '../crypto/keys.js'
import type { TicketExchanger } from '../api/ticket-client.js'
import { TicketExchangeClient } from '../api/ticket-client.js'
import type { RemoteLoginConfig } from '../types/config.js'
import type { LoginResult, RemoteUser } from '../types/session.js'
import { HeartbeatScheduler } from './heartbeat.js'
import { PhaseStore } from './phase-store.js'
import { WsTransport, type Transport, type TransportFactory } from './transport.js'
import { LivenessFailure, ProtocolViolation, RetryBudgetExhaustedError, toError } from './errors.js'
import { buildQrUrl, parseUserPayload } from './user-payload.js'
import type { ServerMessage } from './messages.js'

/** Result of one connection attempt */
export type AttemptOutcome =
  | { kind: 'reconnect'; reason: Error }
  | { kind: 'completed'; token: string; user: RemoteUser | null }
  | { kind: 'cancelled' }
  | { kind: 'aborted' }
  | { kind: 'fatal'; error: Error }

/** Handshake progress within a single attempt */
type AttemptPhase = 'loading' | 'qr_code' | 'accepted'

export interface RemoteAuthSessionOptions {
  /** Opens a new gateway connection per attempt */
  connect: TransportFactory
  ticketExchanger: TicketExchanger
  /** QR URL with a `{fingerprint}` placeholder */
  qrUrlTemplate: string
  phases?: PhaseStore
  auditLogger?: AuditLogger
  /** Consecutive failed attempts before giving up. 0 = unlimited. */
  maxAttempts?: number
  reconnectBaseDelayMs?: number
  backoffCeilingMs?: number
  /** Start a new attempt when the companion device cancels */
  restartOnCancel?: boolean
  /** Key source, replaceable for tests */
  generateKeys?: () => Promise<KeyMaterial>
}

type Next =
  | { type: 'message'; message: ServerMessage | null }
  | { type: 'lost'; reason: Error }
  | { type: 'aborted' }

export class RemoteAuthSession {
  readonly phases: PhaseStore
  readonly id = randomUUID()

  private readonly maxAttempts: number
  private readonly reconnectBaseDelayMs: number
  private readonly backoffCeilingMs: number
  private readonly restartOnCancel: boolean
  private readonly generateKeys: () => Promise<KeyMaterial>
  private running = false
  private failures = 0
  private attempt = 0
  private firstAuditError: Error | null = null

  constructor(private readonly options: RemoteAuthSessionOptions) {
    this.phases = options.phases ?? new PhaseStore()
    this.maxAttempts = options.maxAttempts ?? 0
    this.reconnectBaseDelayMs = options.reconnectBaseDelayMs ?? 1000
    this.backoffCeilingMs = options.backoffCeilingMs ?? 30000
    this.restartOnCancel = options.restartOnCancel ?? false
    this.generateKeys = options.generateKeys ?? (() => KeyMaterial.generate())
  }

  /** Build a session wired to the real gateway and REST API. */
  static fromConfig(
    config: RemoteLoginConfig,
    deps: { auditLogger?: AuditLogger; phases?: PhaseStore } = {},
  ): RemoteAuthSession {
    return new RemoteAuthSession({
      connect: (signal) =>
        WsTransport.connect(config.gateway.url, {
          origin: config.gateway.origin,
          connectTimeoutMs: config.gateway.connectTimeoutMs,
          signal,
        }),
      ticketExchanger: new TicketExchangeClient(config.api.baseUrl, config.gateway.origin),
      qrUrlTemplate: config.qr.urlTemplate,
      maxAttempts: config.reconnect.maxAttempts,
      reconnectBaseDelayMs: config.reconnect.baseDelayMs,
      backoffCeilingMs: config.reconnect.backoffCeilingMs,
      restartOnCancel: config.reconnect.restartOnCancel,
      auditLogger: deps.auditLogger,
      phases: deps.phases,
    })
  }

  /** Number of connection attempts made so far */
  get attempts(): number {
    return this.attempt
  }

  /** First session event log write that failed, if any. Logging never stops the login. */
  get auditError(): Error | null {
    return this.firstAuditError
  }

  /**
   * Run the login flow until a token is obtained, the companion device
   * cancels, or the signal aborts.
   *
   * @throws TicketExchangeError or CryptoError when the final exchange fails
   * @throws RetryBudgetExhaustedError when maxAttempts consecutive attempts fail
   */
  async login(signal?: AbortSignal): Promise<LoginResult> {
    if (this.running) {
      throw new Error('login() is already running for this session')
    }
    this.running = true
    this.failures = 0
    this.phases.publish({ status: 'loading' })

    try {
      for (;;) {
        if (signal?.aborted) return this.abort()

        this.attempt++
        const outcome = await this.runAttempt(signal)

        switch (outcome.kind) {
          case 'completed':
            this.audit({ category: 'session', action: 'session.completed', details: { attempt: this.attempt } })
            return { status: 'completed', token: outcome.token, user: outcome.user }

          case 'aborted':
            return this.abort()

          case 'fatal':
            this.audit({
              category: 'session',
              action: 'session.failed',
              details: { attempt: this.attempt, error: outcome.error.name },
            })
            throw outcome.error

          case 'cancelled':
            this.audit({ category: 'session', action: 'session.cancelled', details: { attempt: this.attempt } })
            if (!this.restartOnCancel) return { status: 'cancelled' }
            break

          case 'reconnect': {
            this.failures++
            this.audit({
              category: 'session',
              action: 'session.reconnect',
              details: {
                attempt: this.attempt,
                reason: outcome.reason.name,
                ...(hasCode(outcome.reason) ? { code: outcome.reason.code } : {}),
              },
            })
            if (this.maxAttempts > 0 && this.failures >= this.maxAttempts) {
              throw new RetryBudgetExhaustedError(this.failures, outcome.reason)
            }
            if (this.phases.get().status !== 'cancelled') {
              this.phases.publish({ status: 'loading' })
            }
            const completed = await delay(this.backoffDelay(), signal)
            if (!completed) return this.abort()
            break
          }
        }
      }
    } finally {
      this.running = false
    }
  }

  /** Full-jitter exponential backoff, capped at backoffCeilingMs. */
  private backoffDelay(): number {
    if (this.reconnectBaseDelayMs === 0) return 0
    return Math.min(
      this.backoffCeilingMs,
      Math.pow(2, this.failures) * this.reconnectBaseDelayMs * Math.random(),
    )
  }

  private abort(): LoginResult {
    this.audit({ category: 'session', action: 'session.aborted', details: { attempt: this.attempt } })
    return { status: 'aborted' }
  }

  /**
   * One connection attempt: fresh keypair, fresh socket, inner loop.
   * The socket is closed on every exit path.
   */
  private async runAttempt(signal?: AbortSignal): Promise<AttemptOutcome> {
    // Key generation failure is fatal to the attempt and surfaced, never retried.
    let keys: KeyMaterial
    try {
      keys = await this.generateKeys()
    } catch (err) {
      return { kind: 'fatal', error: toError(err) }
    }

    let transport: Transport
    try {
      transport = await this.options.connect(signal)
    } catch (err) {
      if (signal?.aborted) return { kind: 'aborted' }
      return { kind: 'reconnect', reason: toError(err) }
    }
    this.audit({ category: 'connection', action: 'connection.opened', details: { attempt: this.attempt } })

    try {
      return await this.runConnection(transport, keys, signal)
    } finally {
      transport.close()
      this.audit({ category: 'connection', action: 'connection.closed', details: { attempt: this.attempt } })
    }
  }

  private async runConnection(
    transport: Transport,
    keys: KeyMaterial,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    let phase: AttemptPhase = 'loading'
    let user: RemoteUser | null = null

    let signalLost: (reason: Error) => void = () => {}
    const lost = new Promise<Error>((resolve) => {
      signalLost = resolve
    })

    let onAbort: () => void = () => {}
    const aborted = new Promise<void>((resolve) => {
      onAbort = resolve
    })
    if (signal?.aborted) return { kind: 'aborted' }
    signal?.addEventListener('abort', onAbort, { once: true })

    const heartbeat = new HeartbeatScheduler(
      () => {
        try {
          transport.send({ op: 'heartbeat' })
          this.audit({ category: 'heartbeat', action: 'heartbeat.sent' })
        } catch (err) {
          signalLost(toError(err))
        }
      },
      (intervalMs) => {
        signalLost(new LivenessFailure(intervalMs))
        this.audit({ category: 'heartbeat', action: 'heartbeat.missed', details: { interval_ms: intervalMs } })
      },
    )

    const lostNext = lost.then((reason): Next => ({ type: 'lost', reason }))
    const abortedNext = aborted.then((): Next => ({ type: 'aborted' }))

    try {
      for (;;) {
        const next: Next = await Promise.race([
          transport.recv().then((message): Next => ({ type: 'message', message })),
          lostNext,
          abortedNext,
        ])

        if (next.type === 'aborted') return { kind: 'aborted' }
        if (next.type === 'lost') return { kind: 'reconnect', reason: next.reason }

        const message = next.message
        if (message === null) {
          return {
            kind: 'reconnect',
            reason: new ProtocolViolation('CONNECTION_CLOSED', `Gateway closed the connection while ${phase}`),
          }
        }

        switch (message.op) {
          case 'hello':
            // A repeated hello must not reset an unacknowledged heartbeat.
            if (heartbeat.isActive) break
            heartbeat.start(message.heartbeat_interval)
            transport.send({ op: 'init', encoded_public_key: keys.encodedPublicKey })
            this.audit({
              category: 'handshake',
              action: 'handshake.init_sent',
              details: { heartbeat_interval: message.heartbeat_interval, timeout_ms: message.timeout_ms },
            })
            break

          case 'nonce_proof': {
            const nonce = keys.decryptBase64(message.encrypted_nonce)
            transport.send({ op: 'nonce_proof', nonce: nonce.toString('base64url') })
            this.audit({ category: 'handshake', action: 'handshake.nonce_proved' })
            break
          }

          case 'pending_remote_init': {
            expectPhase(phase, 'loading', message.op)
            if (message.fingerprint !== keys.fingerprint) {
              this.audit({ category: 'handshake', action: 'handshake.fingerprint_mismatch' })
              return {
                kind: 'reconnect',
                reason: new ProtocolViolation('FINGERPRINT_MISMATCH', 'Gateway fingerprint does not match local public key'),
              }
            }
            phase = 'qr_code'
            this.failures = 0
            this.phases.publish({
              status: 'qr_code',
              fingerprint: message.fingerprint,
              displayPayload: buildQrUrl(this.options.qrUrlTemplate, message.fingerprint),
            })
            this.audit({ category: 'handshake', action: 'handshake.fingerprint_verified' })
            break
          }

          case 'pending_ticket': {
            expectPhase(phase, 'qr_code', message.op)
            user = parseUserPayload(keys.decryptBase64(message.encrypted_user_payload))
            phase = 'accepted'
            this.phases.publish({ status: 'accepted', user })
            this.audit({ category: 'handshake', action: 'handshake.user_accepted', details: { user_id: user.userId } })
            break
          }

          case 'pending_login':
            expectPhase(phase, 'accepted', message.op)
            return await this.exchangeTicket(message.ticket, keys, user, signal)

          case 'heartbeat_ack':
            heartbeat.acknowledge()
            break

          case 'cancel':
            this.phases.publish({ status: 'cancelled' })
            return { kind: 'cancelled' }
        }
      }
    } catch (err) {
      // Decode, decrypt, ordering and send failures on this connection restart the attempt.
      return { kind: 'reconnect', reason: toError(err) }
    } finally {
      heartbeat.stop()
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * Terminal step: the ticket is single-use, so any failure here is fatal
   * to the attempt and surfaced rather than retried.
   */
  private async exchangeTicket(
    ticket: string,
    keys: KeyMaterial,
    user: RemoteUser | null,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    let encryptedToken: string
    try {
      const response = await this.options.ticketExchanger.exchange(ticket, signal)
      encryptedToken = response.encrypted_token
    } catch (err) {
      if (signal?.aborted) return { kind: 'aborted' }
      this.audit({ category: 'ticket', action: 'ticket.failed', details: { stage: 'exchange' } })
      return { kind: 'fatal', error: toError(err) }
    }

    let token: string
    try {
      token = keys.decryptBase64(encryptedToken).toString('utf-8')
    } catch (err) {
      this.audit({ category: 'ticket', action: 'ticket.failed', details: { stage: 'decrypt' } })
      return { kind: 'fatal', error: toError(err) }
    }

    this.audit({ category: 'ticket', action: 'ticket.exchanged' })
    this.phases.publish({ status: 'completed', user })
    return { kind: 'completed', token, user }
  }

  /** Record a session event. Runs inside timers and finally blocks, so it never throws. */
  private audit(event: Omit<AuditEvent, 'sessionId'>): void {
    try {
      this.options.auditLogger?.append({ ...event, sessionId: this.id })
    } catch (err) {
      if (!this.firstAuditError) this.firstAuditError = toError(err)
    }
  }
}

function expectPhase(actual: AttemptPhase, expected: AttemptPhase, op: ServerMessage['op']): void {
  if (actual !== expected) {
    throw new ProtocolViolation('UNEXPECTED_OPCODE', `Received ${op} while ${actual}, expected ${expected}`)
  }
}

function hasCode(err: Error): err is Error & { code: string } {
  return 'code' in err && typeof err.code === 'string'
}

/** Abortable sleep. Resolves false if the signal fired first. */
function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false)
  if (ms <= 0) return Promise.resolve(true)
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
