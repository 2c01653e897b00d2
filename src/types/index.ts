// Configuration
export { RemoteLoginConfigSchema, WebSocketUrl, HttpUrl } from './config.js'
export type { RemoteLoginConfig } from './config.js'

// Session event log
export { AuditCategorySchema, AuditEntrySchema } from './audit.js'
export type { AuditCategory, AuditEntry } from './audit.js'

// Session phases
export type { RemoteUser, SessionPhase, SessionStatus, LoginResult } from './session.js'
