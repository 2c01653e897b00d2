/** Typed crypto error codes for downstream error handling */
export type CryptoErrorCode = 'KEY_GENERATION_FAILED' | 'DECRYPT_FAILED' | 'INVALID_ENCODING'

/** Key generation or decryption failure with typed error code */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode

  constructor(code: CryptoErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CryptoError'
    this.code = code
  }
}
