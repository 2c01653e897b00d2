import { Type, type Static } from '@sinclair/typebox'

/** Session event category */
export const AuditCategorySchema = Type.Union([
  Type.Literal('connection'),
  Type.Literal('handshake'),
  Type.Literal('heartbeat'),
  Type.Literal('ticket'),
  Type.Literal('session'),
])

export type AuditCategory = Static<typeof AuditCategorySchema>

/** Session event log entry schema */
export const AuditEntrySchema = Type.Object({
  sequence: Type.Integer({ minimum: 1 }),
  timestamp: Type.String(),
  category: AuditCategorySchema,
  action: Type.String(),
  session_id: Type.Optional(Type.String()),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  prev_hash: Type.String(),
  hash: Type.String(),
})

export type AuditEntry = Static<typeof AuditEntrySchema>
