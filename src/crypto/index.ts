export { CryptoError } from './errors.js'
export type { CryptoErrorCode } from './errors.js'

export {
  KeyMaterial,
  RSA_MODULUS_BITS,
  fingerprintOf,
  encodeFingerprint,
  decodeBase64,
} from './keys.js'
