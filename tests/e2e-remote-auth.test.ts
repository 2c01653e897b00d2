/**
 * End-to-end login against the in-process mock gateway and REST API.
 *
 * Configuration comes from QR_LOGIN_* variables through loadConfig, the
 * session from RemoteAuthSession.fromConfig, so the real WebSocket
 * transport and ticket exchange client are on the wire.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig } from '../src/config/index.js'
import { RemoteAuthSession, RetryBudgetExhaustedError } from '../src/gateway/index.js'
import { TicketExchangeError } from '../src/api/index.js'
import { AuditLogger, verifyAuditChain } from '../src/audit/index.js'
import type { RemoteLoginConfig } from '../src/types/index.js'
import { MockRemoteAuthServer, MOCK_TOKEN, type MockServerOptions } from '../test/mock-gateway/server.js'

const ORIGIN = 'https://origin.example.test'

describe('E2E: QR remote login', () => {
  let server: MockRemoteAuthServer | null = null
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'qr-login-e2e-'))
  })

  afterEach(async () => {
    await server?.stop()
    server = null
    rmSync(tempDir, { recursive: true, force: true })
  })

  async function startServer(options: MockServerOptions = {}): Promise<MockRemoteAuthServer> {
    const started = new MockRemoteAuthServer(options)
    await started.start()
    server = started
    return started
  }

  function configFor(gatewayUrl: string, apiBaseUrl: string, maxAttempts = 0): RemoteLoginConfig {
    return loadConfig(undefined, {
      QR_LOGIN_GATEWAY__URL: gatewayUrl,
      QR_LOGIN_GATEWAY__ORIGIN: ORIGIN,
      QR_LOGIN_GATEWAY__CONNECTTIMEOUTMS: '2000',
      QR_LOGIN_API__BASEURL: apiBaseUrl,
      QR_LOGIN_QR__URLTEMPLATE: 'https://example.test/ra/{fingerprint}',
      QR_LOGIN_RECONNECT__BASEDELAYMS: '0',
      QR_LOGIN_RECONNECT__MAXATTEMPTS: String(maxAttempts),
    })
  }

  it('logs in and records an intact session event chain', async () => {
    const mock = await startServer()
    const auditPath = join(tempDir, 'session-events.jsonl')
    const session = RemoteAuthSession.fromConfig(configFor(mock.gatewayUrl, mock.apiBaseUrl), {
      auditLogger: new AuditLogger(auditPath),
    })
    const displayPayloads: string[] = []
    session.phases.onPhase((phase) => {
      if (phase.status === 'qr_code') displayPayloads.push(phase.displayPayload)
    })

    const result = await session.login()

    expect(result).toEqual({
      status: 'completed',
      token: MOCK_TOKEN,
      user: { userId: '123', discriminator: '4567', avatarHash: 'hash', displayName: 'name' },
    })
    expect(mock.origins).toEqual([ORIGIN])
    expect(mock.gateways).toHaveLength(1)
    expect(mock.gateways[0].nonceVerified).toBe(true)
    expect(displayPayloads).toEqual([`https://example.test/ra/${mock.gateways[0].fingerprint}`])
    expect(mock.exchangedTickets).toEqual(['test-ticket'])

    expect(verifyAuditChain(auditPath)).toEqual({ valid: true, entries: 8, errors: [] })
  })

  it('reconnects with a fresh key after a fingerprint mismatch', async () => {
    const mock = await startServer({ scripts: [{ tamperFingerprint: true }, {}] })
    const session = RemoteAuthSession.fromConfig(configFor(mock.gatewayUrl, mock.apiBaseUrl))

    const result = await session.login()

    expect(result.status).toBe('completed')
    expect(mock.gateways).toHaveLength(2)
    expect(mock.gateways[0].fingerprint).not.toBe(mock.gateways[1].fingerprint)
    expect(session.attempts).toBe(2)
  })

  it('ends without a token when the companion device cancels', async () => {
    const mock = await startServer({ scripts: [{ cancelAt: 'qr_code' }] })
    const session = RemoteAuthSession.fromConfig(configFor(mock.gatewayUrl, mock.apiBaseUrl))

    expect(await session.login()).toEqual({ status: 'cancelled' })
    expect(mock.exchangedTickets).toEqual([])
  })

  it('surfaces a rejected ticket without retrying', async () => {
    const mock = await startServer({ rejectTickets: true })
    const session = RemoteAuthSession.fromConfig(configFor(mock.gatewayUrl, mock.apiBaseUrl))

    const err = await session.login().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TicketExchangeError)
    expect(err).toMatchObject({
      statusCode: 400,
      message: 'ticket exchange failed: 50035 Invalid Form Body',
      fieldErrors: [{ path: 'ticket', code: 'TICKET_INVALID', message: 'Invalid ticket' }],
    })
    expect(mock.gateways).toHaveLength(1)
  })

  it('gives up when the gateway is unreachable and the retry budget runs out', async () => {
    const mock = await startServer()
    const { gatewayUrl, apiBaseUrl } = mock
    await mock.stop()
    server = null
    const session = RemoteAuthSession.fromConfig(configFor(gatewayUrl, apiBaseUrl, 2))

    const err = await session.login().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RetryBudgetExhaustedError)
    expect(err).toMatchObject({ attempts: 2 })
    expect(session.attempts).toBe(2)
  })

  it('stops when the caller aborts while the QR code is displayed', async () => {
    const mock = await startServer({ scripts: [{ userPayload: null }] })
    const session = RemoteAuthSession.fromConfig(configFor(mock.gatewayUrl, mock.apiBaseUrl))
    const controller = new AbortController()
    session.phases.onPhase((phase) => {
      if (phase.status === 'qr_code') controller.abort()
    })

    expect(await session.login(controller.signal)).toEqual({ status: 'aborted' })
    expect(mock.gateways).toHaveLength(1)
  })
})
