/**
 * Authenticated encryption of secret maps under a machine-bound key.
 *
 * @remarks
 * Wire form: `<base64url salt>:<compact JWE>`. The JWE uses `dir` key
 * agreement with `A256GCM` content encryption via `jose`; the plaintext is
 * the canonical JSON of the map (keys sorted). A compact JWE is five
 * base64url segments joined by dots, so the only colon in the payload is the
 * separator.
 */

import { CompactEncrypt, compactDecrypt } from 'jose'
import { CryptoUnavailableError, DecryptFailureError } from '../errors.js'
import { err, ok } from '../result.js'
import type { Result } from '../result.js'
import type { EncryptedPayload, SecretMap } from '../types.js'
import { deriveKey, SALT_BYTES } from './kdf.js'
import type { KeyDeriver } from './kdf.js'

const ALGORITHM = 'dir'
const ENCRYPTION = 'A256GCM'
const SEPARATOR = ':'
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/

/** Options for {@link SecretCipher}. */
export interface SecretCipherOptions {
  /** Override key derivation. */
  deriveKey?: KeyDeriver | undefined
}

/**
 * Type guard that checks whether an unknown value is a non-null object.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Parse a decrypted plaintext into a SecretMap, or `undefined` if it is not one. */
function parseSecretMap(raw: unknown): SecretMap | undefined {
  if (!isObject(raw)) {
    return undefined
  }
  const entries: [string, string][] = []
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== 'string') {
      return undefined
    }
    entries.push([name, value])
  }
  return Object.fromEntries(entries)
}

/** JSON with keys in sorted order, so equal maps serialize identically. */
export function canonicalJson(secrets: SecretMap): string {
  const sorted = Object.entries(secrets).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  return JSON.stringify(Object.fromEntries(sorted))
}

/**
 * Encrypts and decrypts secret maps with a key derived from the machine
 * identity.
 *
 * @public
 */
export class SecretCipher {
  readonly #identity: () => Promise<string>
  readonly #deriveKey: KeyDeriver

  /**
   * @param identity - Source of the machine identity, typically
   *   `() => machineIdentity.resolve()`.
   */
  constructor(identity: () => Promise<string>, options?: SecretCipherOptions) {
    this.#identity = identity
    this.#deriveKey = options?.deriveKey ?? deriveKey
  }

  /**
   * Encrypt `secrets` under a freshly salted key.
   *
   * @returns `err(CryptoUnavailableError)` when key derivation or the cipher
   * fails. Encryption is a hardening layer; callers fall back to keeping the
   * plaintext.
   */
  async encrypt(secrets: SecretMap): Promise<Result<EncryptedPayload, CryptoUnavailableError>> {
    const identity = await this.#identity()
    const derived = await this.#deriveKey(identity)
    if (!derived.ok) {
      return derived
    }

    const { key, salt } = derived.value
    try {
      const plaintext = new TextEncoder().encode(canonicalJson(secrets))
      const jwe = await new CompactEncrypt(plaintext)
        .setProtectedHeader({ alg: ALGORITHM, enc: ENCRYPTION })
        .encrypt(key)
      return ok(`${Buffer.from(salt).toString('base64url')}${SEPARATOR}${jwe}`)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return err(new CryptoUnavailableError(`Encryption failed: ${message}`, { cause: error }))
    } finally {
      key.fill(0)
    }
  }

  /**
   * Decrypt a payload produced by {@link SecretCipher.encrypt} on this machine.
   *
   * @returns `err(DecryptFailureError)` for a malformed payload, a key that
   * does not match (payload from another machine, or tampered), or a plaintext
   * that is not a string-to-string map. Key derivation failures are reported
   * the same way, since the payload cannot be opened either way.
   */
  async decrypt(payload: EncryptedPayload): Promise<Result<SecretMap, DecryptFailureError>> {
    const index = payload.indexOf(SEPARATOR)
    if (index <= 0) {
      return err(new DecryptFailureError('Encrypted payload has no salt separator', 'malformed'))
    }

    const saltSegment = payload.slice(0, index)
    const jwe = payload.slice(index + 1)
    if (!BASE64URL_PATTERN.test(saltSegment) || jwe === '') {
      return err(new DecryptFailureError('Encrypted payload is malformed', 'malformed'))
    }
    const salt = new Uint8Array(Buffer.from(saltSegment, 'base64url'))
    if (salt.length !== SALT_BYTES) {
      return err(new DecryptFailureError('Encrypted payload salt has the wrong length', 'malformed'))
    }

    const identity = await this.#identity()
    const derived = await this.#deriveKey(identity, salt)
    if (!derived.ok) {
      return err(
        new DecryptFailureError(derived.error.message, 'key-mismatch', { cause: derived.error }),
      )
    }

    const { key } = derived.value
    let plaintext: Uint8Array
    try {
      const result = await compactDecrypt(jwe, key)
      plaintext = result.plaintext
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return err(
        new DecryptFailureError(`Decryption failed: ${message}`, 'key-mismatch', { cause: error }),
      )
    } finally {
      key.fill(0)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(new TextDecoder().decode(plaintext))
    } catch (error) {
      return err(
        new DecryptFailureError('Decrypted payload is not valid JSON', 'invalid-json', {
          cause: error,
        }),
      )
    } finally {
      plaintext.fill(0)
    }

    const secrets = parseSecretMap(parsed)
    if (secrets === undefined) {
      return err(new DecryptFailureError('Decrypted payload is not a secret map', 'invalid-shape'))
    }
    return ok(secrets)
  }
}
