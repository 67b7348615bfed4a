/**
 * Machine-bound key derivation.
 *
 * PBKDF2-HMAC-SHA-256, 100 000 iterations, 32-byte output. The password is the
 * machine identity and the salt is 16 random bytes generated per encryption,
 * so a given (identity, salt) pair always yields the same key.
 */

import * as crypto from 'node:crypto'
import { promisify } from 'node:util'
import { CryptoUnavailableError } from '../errors.js'
import { err, ok } from '../result.js'
import type { Result } from '../result.js'

const pbkdf2 = promisify(crypto.pbkdf2)

export const PBKDF2_ITERATIONS = 100_000
export const KEY_BYTES = 32
export const SALT_BYTES = 16
const DIGEST = 'sha256'

/**
 * A derived symmetric key.
 * @public
 */
export interface DerivedKey {
  /** 32 raw key bytes. Zero them with `key.fill(0)` when done. */
  key: Uint8Array
  /** The same key, base64url-encoded. */
  encoded: string
  /** The 16-byte salt the key was derived with. */
  salt: Uint8Array
}

/**
 * Derives a key from a machine identity and salt.
 * @public
 */
export type KeyDeriver = (
  identity: string,
  salt?: Uint8Array,
) => Promise<Result<DerivedKey, CryptoUnavailableError>>

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Derive a 32-byte key from `identity`. A fresh random salt is generated when
 * `salt` is omitted.
 *
 * @returns `err(CryptoUnavailableError)` when the random source or PBKDF2
 * fails, or when the supplied salt is not 16 bytes.
 */
export const deriveKey: KeyDeriver = async (identity, salt) => {
  let saltBytes: Uint8Array
  if (salt === undefined) {
    try {
      saltBytes = new Uint8Array(crypto.randomBytes(SALT_BYTES))
    } catch (error) {
      return err(new CryptoUnavailableError(`Random source unavailable: ${describe(error)}`, { cause: error }))
    }
  } else if (salt.length !== SALT_BYTES) {
    return err(
      new CryptoUnavailableError(`Salt must be ${String(SALT_BYTES)} bytes, got ${String(salt.length)}`),
    )
  } else {
    saltBytes = salt
  }

  try {
    const derived = await pbkdf2(identity, saltBytes, PBKDF2_ITERATIONS, KEY_BYTES, DIGEST)
    const key = new Uint8Array(derived)
    derived.fill(0)
    return ok({ key, encoded: Buffer.from(key).toString('base64url'), salt: saltBytes })
  } catch (error) {
    return err(new CryptoUnavailableError(`Key derivation failed: ${describe(error)}`, { cause: error }))
  }
}
