/** Identity of the companion-device user who approved the login */
export interface RemoteUser {
  userId: string
  discriminator: string
  /** `null` when the account has no avatar */
  avatarHash: string | null
  displayName: string
}

/**
 * Externally observable session phase.
 *
 * Published through the PhaseStore; readers only ever see the latest value.
 */
export type SessionPhase =
  | { status: 'loading' }
  | { status: 'qr_code'; fingerprint: string; displayPayload: string }
  | { status: 'accepted'; user: RemoteUser }
  | { status: 'cancelled' }
  | { status: 'completed'; user: RemoteUser | null }

export type SessionStatus = SessionPhase['status']

/** Final result of a login run */
export type LoginResult =
  | { status: 'completed'; token: string; user: RemoteUser | null }
  | { status: 'cancelled' }
  | { status: 'aborted' }
