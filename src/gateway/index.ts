export { RemoteAuthSession } from './session.js'
export type { AttemptOutcome, RemoteAuthSessionOptions } from './session.js'

export { WsTransport } from './transport.js'
export type { Transport, TransportFactory, WsTransportOptions } from './transport.js'

export { HeartbeatScheduler } from './heartbeat.js'
export { PhaseStore } from './phase-store.js'

export {
  ConnectError,
  LivenessFailure,
  ProtocolViolation,
  RetryBudgetExhaustedError,
} from './errors.js'
export type { ProtocolViolationCode } from './errors.js'

export {
  ServerMessageSchema,
  ClientMessageSchema,
  decodeServerMessage,
  encodeClientMessage,
} from './messages.js'
export type { ServerMessage, ClientMessage, ServerOpcode } from './messages.js'

export { parseUserPayload, buildQrUrl } from './user-payload.js'
