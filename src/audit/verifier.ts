import { readFileSync, existsSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { AuditEntrySchema } from '../types/audit.js'
import { GENESIS_HASH, hashEntry } from './logger.js'

/**
 * Result of session event chain verification.
 */
export interface VerificationResult {
  /** Whether the entire chain is valid */
  valid: boolean
  /** Total number of lines checked */
  entries: number
  /** List of errors found, with line number and description */
  errors: Array<{ line: number; error: string }>
}

/**
 * Verify a hash-chained JSONL session event log.
 *
 * For each line: the entry matches the schema, its hash matches the
 * recomputed one, `prev_hash` links to the previous entry, and sequence
 * numbers strictly increase. A missing or empty file is a valid, empty chain.
 */
export function verifyAuditChain(auditPath: string): VerificationResult {
  if (!existsSync(auditPath)) {
    return { valid: true, entries: 0, errors: [] }
  }

  const content = readFileSync(auditPath, 'utf-8').trim()
  if (content.length === 0) {
    return { valid: true, entries: 0, errors: [] }
  }

  const errors: Array<{ line: number; error: string }> = []
  const lines = content.split('\n')
  let previousHash = GENESIS_HASH
  let previousSequence = 0

  lines.forEach((text, i) => {
    const line = i + 1

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      errors.push({ line, error: `Invalid JSON on line ${line}` })
      return
    }

    if (!Value.Check(AuditEntrySchema, parsed)) {
      errors.push({ line, error: `Malformed entry on line ${line}` })
      return
    }

    const { hash, ...unhashed } = parsed
    const computed = hashEntry(unhashed)
    if (hash !== computed) {
      errors.push({ line, error: `Hash mismatch on line ${line}: recorded ${hash}, computed ${computed}` })
    }

    if (parsed.prev_hash !== previousHash) {
      errors.push({
        line,
        error: `prev_hash mismatch on line ${line}: expected ${previousHash}, found ${parsed.prev_hash}`,
      })
    }

    if (parsed.sequence <= previousSequence) {
      errors.push({
        line,
        error: `Sequence not monotonically increasing on line ${line}: expected > ${previousSequence}, found ${parsed.sequence}`,
      })
    }

    previousHash = hash
    previousSequence = parsed.sequence
  })

  return { valid: errors.length === 0, entries: lines.length, errors }
}
