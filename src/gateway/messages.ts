import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { ProtocolViolation } from './errors.js'

// ---------------------------------------------------------------------------
// Client -> Gateway
// ---------------------------------------------------------------------------

/** Start a remote-auth session with the client's public key */
export const InitMessageSchema = Type.Object({
  op: Type.Literal('init'),
  /** Standard base64 of the SPKI DER RSA public key */
  encoded_public_key: Type.String(),
})
export type InitMessage = Static<typeof InitMessageSchema>

/** Prove possession of the private key */
export const NonceProofResponseSchema = Type.Object({
  op: Type.Literal('nonce_proof'),
  /** base64url (no padding) of the decrypted nonce */
  nonce: Type.String(),
})
export type NonceProofResponse = Static<typeof NonceProofResponseSchema>

/** Liveness ping */
export const HeartbeatMessageSchema = Type.Object({
  op: Type.Literal('heartbeat'),
})
export type HeartbeatMessage = Static<typeof HeartbeatMessageSchema>

export const ClientMessageSchema = Type.Union([
  InitMessageSchema,
  NonceProofResponseSchema,
  HeartbeatMessageSchema,
])
export type ClientMessage = Static<typeof ClientMessageSchema>

// ---------------------------------------------------------------------------
// Gateway -> Client
// ---------------------------------------------------------------------------

/** Greeting with heartbeat interval and session lifespan */
export const HelloMessageSchema = Type.Object({
  op: Type.Literal('hello'),
  /** Capped at the largest delay a Node timer honours */
  heartbeat_interval: Type.Integer({ minimum: 1, maximum: 2147483647 }),
  timeout_ms: Type.Integer({ minimum: 0 }),
})
export type HelloMessage = Static<typeof HelloMessageSchema>

/** Nonce encrypted against the client's public key */
export const NonceChallengeMessageSchema = Type.Object({
  op: Type.Literal('nonce_proof'),
  encrypted_nonce: Type.String(),
})
export type NonceChallengeMessage = Static<typeof NonceChallengeMessageSchema>

/** Handshake accepted; waiting for the companion device to scan */
export const PendingRemoteInitMessageSchema = Type.Object({
  op: Type.Literal('pending_remote_init'),
  fingerprint: Type.String({ minLength: 1 }),
})
export type PendingRemoteInitMessage = Static<typeof PendingRemoteInitMessageSchema>

/** Companion device scanned the code; encrypted user identity attached */
export const PendingTicketMessageSchema = Type.Object({
  op: Type.Literal('pending_ticket'),
  encrypted_user_payload: Type.String(),
})
export type PendingTicketMessage = Static<typeof PendingTicketMessageSchema>

/** Companion device approved; single-use ticket attached */
export const PendingLoginMessageSchema = Type.Object({
  op: Type.Literal('pending_login'),
  ticket: Type.String({ minLength: 1 }),
})
export type PendingLoginMessage = Static<typeof PendingLoginMessageSchema>

export const HeartbeatAckMessageSchema = Type.Object({
  op: Type.Literal('heartbeat_ack'),
})
export type HeartbeatAckMessage = Static<typeof HeartbeatAckMessageSchema>

/** Companion device aborted the login */
export const CancelMessageSchema = Type.Object({
  op: Type.Literal('cancel'),
})
export type CancelMessage = Static<typeof CancelMessageSchema>

/** Union of all inbound messages (gateway -> client) */
export const ServerMessageSchema = Type.Union([
  HelloMessageSchema,
  NonceChallengeMessageSchema,
  PendingRemoteInitMessageSchema,
  PendingTicketMessageSchema,
  PendingLoginMessageSchema,
  HeartbeatAckMessageSchema,
  CancelMessageSchema,
])
export type ServerMessage = Static<typeof ServerMessageSchema>

export type ServerOpcode = ServerMessage['op']

/**
 * Parse and validate a text frame from the gateway.
 *
 * @throws ProtocolViolation('INVALID_MESSAGE') on bad JSON or an unknown/ill-formed opcode
 */
export function decodeServerMessage(raw: string): ServerMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ProtocolViolation('INVALID_MESSAGE', 'Gateway frame is not valid JSON', { cause: err })
  }

  if (!Value.Check(ServerMessageSchema, parsed)) {
    const op =
      parsed !== null && typeof parsed === 'object' && 'op' in parsed ? String(parsed.op) : 'missing'
    throw new ProtocolViolation('INVALID_MESSAGE', `Unrecognized gateway message (op: ${op})`)
  }

  return parsed
}

/** Serialize an outbound message as a JSON text frame. */
export function encodeClientMessage(message: ClientMessage): string {
  return JSON.stringify(message)
}
