import { describe, it, expect } from 'vitest'
import { deriveKey, KEY_BYTES, SALT_BYTES } from '../../../src/crypto/kdf.js'
import { CryptoUnavailableError } from '../../../src/errors.js'
import { unwrap } from '../../../src/result.js'

describe('deriveKey', () => {
  it('generates a fresh salt and a 32-byte key', async () => {
    const derived = unwrap(await deriveKey('test-machine'))
    expect(derived.salt).toHaveLength(SALT_BYTES)
    expect(derived.key).toHaveLength(KEY_BYTES)
    expect(derived.encoded).toBe(Buffer.from(derived.key).toString('base64url'))
  })

  it('is deterministic for the same identity and salt', async () => {
    const salt = new Uint8Array(SALT_BYTES).fill(7)
    const first = unwrap(await deriveKey('test-machine', salt))
    const second = unwrap(await deriveKey('test-machine', salt))
    expect(first.encoded).toBe(second.encoded)
  })

  it('gives different keys for different identities', async () => {
    const salt = new Uint8Array(SALT_BYTES).fill(7)
    const first = unwrap(await deriveKey('machine-a', salt))
    const second = unwrap(await deriveKey('machine-b', salt))
    expect(first.encoded).not.toBe(second.encoded)
  })

  it('gives different salts on each call without one', async () => {
    const first = unwrap(await deriveKey('test-machine'))
    const second = unwrap(await deriveKey('test-machine'))
    expect(Buffer.from(first.salt).equals(Buffer.from(second.salt))).toBe(false)
  })

  it('rejects a salt of the wrong length', async () => {
    const result = await deriveKey('test-machine', new Uint8Array(8))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CryptoUnavailableError)
      expect(result.error.message).toBe('Salt must be 16 bytes, got 8')
    }
  })
})
