import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, readFileSync, writeFileSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createHash } from 'node:crypto'
import { canonicalize } from './serialize.js'
import { AuditLogger, GENESIS_HASH } from './logger.js'
import { verifyAuditChain } from './verifier.js'
import type { AuditCategory } from '../types/audit.js'

function readLines(path: string): string[] {
  return readFileSync(path, 'utf-8').trim().split('\n')
}

function rehash(entry: Record<string, unknown>): string {
  return createHash('sha256')
    .update(canonicalize({ ...entry, hash: undefined }))
    .digest('hex')
}

describe('canonicalize', () => {
  it('sorts object keys recursively', () => {
    expect(canonicalize({ z: { b: 2, a: 1 }, a: 0 })).toBe('{"a":0,"z":{"a":1,"b":2}}')
    expect(canonicalize({ b: 2, a: 1 })).toBe(canonicalize({ a: 1, b: 2 }))
  })

  it('keeps array order', () => {
    expect(canonicalize([3, 1, 2])).toBe('[3,1,2]')
    expect(canonicalize([{ b: 2, a: 1 }])).toBe('[{"a":1,"b":2}]')
  })

  it('drops undefined members', () => {
    expect(canonicalize({ a: 1, b: undefined })).toBe('{"a":1}')
  })

  it('encodes scalars like JSON', () => {
    expect(canonicalize(null)).toBe('null')
    expect(canonicalize(3.5)).toBe('3.5')
    expect(canonicalize(false)).toBe('false')
    expect(canonicalize('qr "code"')).toBe('"qr \\"code\\""')
    expect(canonicalize({})).toBe('{}')
    expect(canonicalize([])).toBe('[]')
  })
})

describe('AuditLogger', () => {
  let tempDir: string
  let auditPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'qr-login-audit-'))
    auditPath = join(tempDir, 'session-events.jsonl')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('starts the chain from the genesis hash', () => {
    const logger = new AuditLogger(auditPath)
    const entry = logger.append({ category: 'connection', action: 'connection.opened' })

    expect(entry.prev_hash).toBe(GENESIS_HASH)
    expect(entry.sequence).toBe(1)
  })

  it('links each entry to the hash of its predecessor', () => {
    const logger = new AuditLogger(auditPath)
    const first = logger.append({ category: 'connection', action: 'connection.opened' })
    const second = logger.append({ category: 'handshake', action: 'handshake.init_sent' })
    const third = logger.append({ category: 'connection', action: 'connection.closed' })

    expect(second.prev_hash).toBe(first.hash)
    expect(third.prev_hash).toBe(second.hash)
    expect([first.sequence, second.sequence, third.sequence]).toEqual([1, 2, 3])
  })

  it('hashes the canonical form of the entry without its hash', () => {
    const logger = new AuditLogger(auditPath)
    const entry = logger.append({ category: 'ticket', action: 'ticket.exchanged' })

    const { hash, ...unhashed } = entry
    expect(hash).toBe(createHash('sha256').update(canonicalize(unhashed)).digest('hex'))
  })

  it('records the session id and details', () => {
    const logger = new AuditLogger(auditPath)
    const entry = logger.append({
      category: 'session',
      action: 'session.reconnect',
      sessionId: 'session-1',
      details: { attempt: 2, code: 'FINGERPRINT_MISMATCH' },
    })

    expect(entry.session_id).toBe('session-1')
    expect(entry.details).toEqual({ attempt: 2, code: 'FINGERPRINT_MISMATCH' })
    expect(JSON.parse(readLines(auditPath)[0])).toEqual(entry)
  })

  it('omits session_id and details when not given', () => {
    const logger = new AuditLogger(auditPath)
    const entry = logger.append({ category: 'heartbeat', action: 'heartbeat.sent' })

    expect('session_id' in entry).toBe(false)
    expect('details' in entry).toBe(false)
  })

  it('accepts every event category', () => {
    const categories: AuditCategory[] = ['connection', 'handshake', 'heartbeat', 'ticket', 'session']
    const logger = new AuditLogger(auditPath)
    for (const category of categories) {
      expect(logger.append({ category, action: `${category}.test` }).category).toBe(category)
    }
  })

  it('resumes the chain from an existing file', () => {
    const last = new AuditLogger(auditPath).append({ category: 'session', action: 'session.completed' })
    const resumed = new AuditLogger(auditPath).append({ category: 'connection', action: 'connection.opened' })

    expect(resumed.prev_hash).toBe(last.hash)
    expect(resumed.sequence).toBe(2)
  })

  it('skips a partially written trailing line when resuming', () => {
    const last = new AuditLogger(auditPath).append({ category: 'session', action: 'session.completed' })
    appendFileSync(auditPath, '{"sequence":2,"timest')

    const resumed = new AuditLogger(auditPath).append({ category: 'connection', action: 'connection.opened' })
    expect(resumed.prev_hash).toBe(last.hash)
    expect(resumed.sequence).toBe(2)
  })
})

describe('verifyAuditChain', () => {
  let tempDir: string
  let auditPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'qr-login-verify-'))
    auditPath = join(tempDir, 'session-events.jsonl')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  function writeChain(count: number): void {
    const logger = new AuditLogger(auditPath)
    for (let i = 0; i < count; i++) {
      logger.append({ category: 'heartbeat', action: 'heartbeat.sent', sessionId: 'session-1' })
    }
  }

  it('passes for an intact chain', () => {
    writeChain(3)
    expect(verifyAuditChain(auditPath)).toEqual({ valid: true, entries: 3, errors: [] })
  })

  it('passes for a missing or empty file', () => {
    expect(verifyAuditChain(join(tempDir, 'missing.jsonl'))).toEqual({ valid: true, entries: 0, errors: [] })
    writeFileSync(auditPath, '')
    expect(verifyAuditChain(auditPath)).toEqual({ valid: true, entries: 0, errors: [] })
  })

  it('detects an edited entry', () => {
    writeChain(2)
    const lines = readLines(auditPath)
    const entry: Record<string, unknown> = JSON.parse(lines[0])
    entry.action = 'heartbeat.missed'
    lines[0] = JSON.stringify(entry)
    writeFileSync(auditPath, lines.join('\n') + '\n')

    const result = verifyAuditChain(auditPath)
    expect(result.valid).toBe(false)
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0].line).toBe(1)
    expect(result.errors[0].error.startsWith('Hash mismatch on line 1: ')).toBe(true)
  })

  it('detects a broken prev_hash link', () => {
    writeChain(2)
    const lines = readLines(auditPath)
    const entry: Record<string, unknown> = JSON.parse(lines[1])
    entry.prev_hash = GENESIS_HASH
    entry.hash = rehash(entry)
    lines[1] = JSON.stringify(entry)
    writeFileSync(auditPath, lines.join('\n') + '\n')

    const result = verifyAuditChain(auditPath)
    expect(result.valid).toBe(false)
    expect(result.errors).toHaveLength(1)
    expect(result.errors[0].error.startsWith('prev_hash mismatch on line 2: ')).toBe(true)
  })

  it('detects a sequence that does not increase', () => {
    writeChain(2)
    const lines = readLines(auditPath)
    const entry: Record<string, unknown> = JSON.parse(lines[1])
    entry.sequence = 1
    entry.hash = rehash(entry)
    lines[1] = JSON.stringify(entry)
    writeFileSync(auditPath, lines.join('\n') + '\n')

    const result = verifyAuditChain(auditPath)
    expect(result.errors).toEqual([
      { line: 2, error: 'Sequence not monotonically increasing on line 2: expected > 1, found 1' },
    ])
  })

  it('reports unparseable and malformed lines', () => {
    writeFileSync(auditPath, 'not json\n{"sequence":1}\n')

    const result = verifyAuditChain(auditPath)
    expect(result.valid).toBe(false)
    expect(result.entries).toBe(2)
    expect(result.errors).toEqual([
      { line: 1, error: 'Invalid JSON on line 1' },
      { line: 2, error: 'Malformed entry on line 2' },
    ])
  })
})
