import { createHash } from 'node:crypto'
import { appendFileSync, readFileSync, existsSync } from 'node:fs'
import { canonicalize } from './serialize.js'
import type { AuditEntry, AuditCategory } from '../types/audit.js'

/**
 * One session event to record.
 *
 * Details must never carry secrets: no tokens, tickets, nonces or key
 * material.
 */
export interface AuditEvent {
  category: AuditCategory
  action: string
  sessionId?: string
  details?: Record<string, unknown>
}

export const GENESIS_HASH = '0'.repeat(64)

/** SHA-256 (hex) over the canonical form of an entry without its hash. */
export function hashEntry(entry: Omit<AuditEntry, 'hash'>): string {
  return createHash('sha256').update(canonicalize(entry)).digest('hex')
}

/**
 * Append-only hash-chained JSONL log of remote-auth session events.
 *
 * Each entry links to its predecessor through `prev_hash`, so truncation or
 * edits are detectable with verifyAuditChain. Reopening an existing file
 * resumes the chain from its last readable line.
 */
export class AuditLogger {
  private lastHash = GENESIS_HASH
  private sequence = 0

  constructor(private readonly auditPath: string) {
    if (!existsSync(auditPath)) return

    const lines = readFileSync(auditPath, 'utf-8').trim().split('\n')
    for (let i = lines.length - 1; i >= 0; i--) {
      const tail = parseEntry(lines[i])
      if (tail) {
        this.lastHash = tail.hash
        this.sequence = tail.sequence
        break
      }
    }
  }

  append(event: AuditEvent): AuditEntry {
    const unhashed: Omit<AuditEntry, 'hash'> = {
      sequence: this.sequence + 1,
      timestamp: new Date().toISOString(),
      category: event.category,
      action: event.action,
      ...(event.sessionId !== undefined ? { session_id: event.sessionId } : {}),
      ...(event.details !== undefined ? { details: event.details } : {}),
      prev_hash: this.lastHash,
    }

    const entry: AuditEntry = { ...unhashed, hash: hashEntry(unhashed) }
    appendFileSync(this.auditPath, JSON.stringify(entry) + '\n')

    this.sequence = entry.sequence
    this.lastHash = entry.hash
    return entry
  }
}

function parseEntry(line: string): { hash: string; sequence: number } | null {
  let value: unknown
  try {
    value = JSON.parse(line)
  } catch {
    // Partially written line from a crash
    return null
  }
  if (
    value !== null &&
    typeof value === 'object' &&
    'hash' in value &&
    typeof value.hash === 'string' &&
    'sequence' in value &&
    typeof value.sequence === 'number'
  ) {
    return { hash: value.hash, sequence: value.sequence }
  }
  return null
}
