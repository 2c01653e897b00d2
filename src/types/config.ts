import { Type, type Static } from '@sinclair/typebox'

/** WebSocket URL (ws:// or wss://) */
export const WebSocketUrl = Type.String({ pattern: '^wss?://' })

/** HTTP(S) base URL */
export const HttpUrl = Type.String({ pattern: '^https?://' })

/** Client configuration schema for qr-login.config.json */
export const RemoteLoginConfigSchema = Type.Object({
  gateway: Type.Object({
    url: WebSocketUrl,
    origin: HttpUrl,
    connectTimeoutMs: Type.Number({ minimum: 100, default: 10000 }),
  }),
  api: Type.Object({
    baseUrl: HttpUrl,
  }),
  qr: Type.Object({
    urlTemplate: Type.String({ minLength: 1 }),
  }),
  reconnect: Type.Object({
    maxAttempts: Type.Integer({ minimum: 0, default: 0 }),
    baseDelayMs: Type.Number({ minimum: 0, default: 1000 }),
    backoffCeilingMs: Type.Number({ minimum: 0, default: 30000 }),
    restartOnCancel: Type.Boolean({ default: false }),
  }),
  audit: Type.Object({
    path: Type.String({ default: './data/session-events.jsonl' }),
    enabled: Type.Boolean({ default: false }),
  }),
})

export type RemoteLoginConfig = Static<typeof RemoteLoginConfigSchema>
