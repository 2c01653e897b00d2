/**
 * Ephemeral key material for one remote-auth connection attempt.
 *
 * Each attempt generates a fresh 2048-bit RSA keypair. The gateway and the
 * companion device encrypt every secret (nonce, user payload, token) against
 * the public key with RSA-OAEP/SHA-256; only this process can decrypt them.
 */

import {
  constants,
  createHash,
  generateKeyPair,
  privateDecrypt,
  type KeyObject,
} from 'node:crypto'
import { promisify } from 'node:util'
import { CryptoError } from './errors.js'

const generateKeyPairAsync = promisify(generateKeyPair)

/** RSA modulus length in bits. */
export const RSA_MODULUS_BITS = 2048

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

/**
 * SHA-256 digest of a DER-encoded (SPKI) public key.
 */
export function fingerprintOf(publicKeyDer: Buffer): Buffer {
  return createHash('sha256').update(publicKeyDer).digest()
}

/** Encode a fingerprint digest the way the gateway sends it (base64url, no padding). */
export function encodeFingerprint(digest: Buffer): string {
  return digest.toString('base64url')
}

/**
 * Decode a standard base64 string, rejecting anything Buffer.from would
 * silently skip over.
 */
export function decodeBase64(value: string): Buffer {
  if (!BASE64_PATTERN.test(value)) {
    throw new CryptoError('INVALID_ENCODING', 'Value is not valid standard base64')
  }
  return Buffer.from(value, 'base64')
}

export class KeyMaterial {
  /** DER (SPKI) encoding of the public key */
  readonly publicKeyDer: Buffer

  private constructor(
    readonly publicKey: KeyObject,
    private readonly privateKey: KeyObject,
  ) {
    this.publicKeyDer = publicKey.export({ type: 'spki', format: 'der' })
  }

  /**
   * Generate a fresh keypair. Failure is reported as
   * CryptoError('KEY_GENERATION_FAILED') and is fatal to the attempt.
   */
  static async generate(): Promise<KeyMaterial> {
    try {
      const { publicKey, privateKey } = await generateKeyPairAsync('rsa', {
        modulusLength: RSA_MODULUS_BITS,
      })
      return new KeyMaterial(publicKey, privateKey)
    } catch (err) {
      throw new CryptoError('KEY_GENERATION_FAILED', 'RSA key generation failed', { cause: err })
    }
  }

  /** Standard base64 of the SPKI DER public key, as sent in `init`. */
  get encodedPublicKey(): string {
    return this.publicKeyDer.toString('base64')
  }

  /** Wire-encoded fingerprint of this keypair's public key. */
  get fingerprint(): string {
    return encodeFingerprint(fingerprintOf(this.publicKeyDer))
  }

  /** Ciphertext length every OAEP block must have for this key. */
  get ciphertextLength(): number {
    const bits = this.privateKey.asymmetricKeyDetails?.modulusLength ?? RSA_MODULUS_BITS
    return bits / 8
  }

  /**
   * RSA-OAEP (SHA-256) decrypt.
   *
   * @throws CryptoError('DECRYPT_FAILED') on a wrong-length block or padding failure
   */
  decrypt(ciphertext: Buffer): Buffer {
    if (ciphertext.length !== this.ciphertextLength) {
      throw new CryptoError(
        'DECRYPT_FAILED',
        `Ciphertext is ${ciphertext.length} bytes, expected ${this.ciphertextLength}`,
      )
    }
    try {
      return privateDecrypt(
        {
          key: this.privateKey,
          padding: constants.RSA_PKCS1_OAEP_PADDING,
          oaepHash: 'sha256',
        },
        ciphertext,
      )
    } catch (err) {
      throw new CryptoError('DECRYPT_FAILED', 'OAEP decryption failed', { cause: err })
    }
  }

  /** Decode a standard base64 ciphertext and decrypt it. */
  decryptBase64(value: string): Buffer {
    return this.decrypt(decodeBase64(value))
  }
}
