/**
 * Key derivation and secret-map encryption.
 */

export { deriveKey, PBKDF2_ITERATIONS, KEY_BYTES, SALT_BYTES } from './kdf.js'
export type { DerivedKey, KeyDeriver } from './kdf.js'
export { SecretCipher, canonicalJson } from './cipher.js'
export type { SecretCipherOptions } from './cipher.js'
