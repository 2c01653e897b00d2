import type { RemoteLoginConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: RemoteLoginConfig = {
  gateway: {
    url: 'wss://remote-auth-gateway.discord.gg/?v=2',
    origin: 'https://discord.com',
    connectTimeoutMs: 10000,
  },
  api: {
    baseUrl: 'https://discord.com/api/v9',
  },
  qr: {
    urlTemplate: 'https://discord.com/ra/{fingerprint}',
  },
  reconnect: {
    maxAttempts: 0,
    baseDelayMs: 1000,
    backoffCeilingMs: 30000,
    restartOnCancel: false,
  },
  audit: {
    path: './data/session-events.jsonl',
    enabled: false,
  },
}
