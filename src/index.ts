// Session orchestration
export {
  RemoteAuthSession,
  WsTransport,
  HeartbeatScheduler,
  PhaseStore,
  ConnectError,
  LivenessFailure,
  ProtocolViolation,
  RetryBudgetExhaustedError,
  decodeServerMessage,
  encodeClientMessage,
  parseUserPayload,
  buildQrUrl,
} from './gateway/index.js'
export type {
  AttemptOutcome,
  RemoteAuthSessionOptions,
  Transport,
  TransportFactory,
  ServerMessage,
  ClientMessage,
  ProtocolViolationCode,
} from './gateway/index.js'

// Key material
export { KeyMaterial, CryptoError, fingerprintOf, encodeFingerprint } from './crypto/index.js'
export type { CryptoErrorCode } from './crypto/index.js'

// Ticket exchange
export { TicketExchangeClient, TicketExchangeError } from './api/index.js'
export type { TicketExchanger, TicketExchangeResponse, ApiError, FieldError } from './api/index.js'

// Configuration
export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'

// Session event log
export { AuditLogger, verifyAuditChain } from './audit/index.js'

export type {
  RemoteLoginConfig,
  RemoteUser,
  SessionPhase,
  LoginResult,
  AuditEntry,
} from './types/index.js'
