export { AuditLogger, GENESIS_HASH, hashEntry } from './logger.js'
export type { AuditEvent } from './logger.js'
export { verifyAuditChain } from './verifier.js'
export type { VerificationResult } from './verifier.js'
export { canonicalize } from './serialize.js'
