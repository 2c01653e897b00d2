import type { RemoteUser } from '../types/session.js'
import { ProtocolViolation } from './errors.js'

/** Avatar hash the companion device sends for accounts without an avatar. */
const NO_AVATAR = '0'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Parse the decrypted `pending_ticket` payload:
 * `user_id:discriminator:avatar_hash:display_name`.
 *
 * Exactly four fields are required; anything else is a protocol violation
 * rather than a partially filled user.
 */
export function parseUserPayload(decrypted: Buffer): RemoteUser {
  let text: string
  try {
    text = utf8.decode(decrypted)
  } catch (err) {
    throw new ProtocolViolation('MALFORMED_USER_PAYLOAD', 'User payload is not valid UTF-8', { cause: err })
  }

  const fields = text.split(':')
  if (fields.length !== 4) {
    throw new ProtocolViolation(
      'MALFORMED_USER_PAYLOAD',
      `User payload has ${fields.length} fields, expected 4`,
    )
  }

  const [userId, discriminator, avatarHash, displayName] = fields
  if (userId.length === 0) {
    throw new ProtocolViolation('MALFORMED_USER_PAYLOAD', 'User payload is missing the user id')
  }

  return {
    userId,
    discriminator,
    avatarHash: avatarHash === NO_AVATAR || avatarHash.length === 0 ? null : avatarHash,
    displayName,
  }
}

/** Substitute the verified fingerprint into the QR URL template. */
export function buildQrUrl(template: string, fingerprint: string): string {
  return template.split('{fingerprint}').join(encodeURIComponent(fingerprint))
}
