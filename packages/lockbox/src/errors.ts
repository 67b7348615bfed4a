/**
 * Error hierarchy for lockbox.
 *
 * Only {@link ConfigurationError} and {@link ProviderError} are ever thrown to
 * callers of the cache. The remaining classes describe degradations that the
 * cache absorbs, and travel inside `Result` values rather than being thrown.
 *
 * @packageDocumentation
 */

/** Base error for all lockbox errors. */
export class LockboxError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'LockboxError'
  }
}

/**
 * Thrown when a bootstrap value (access token, state file, organization id)
 * is missing or invalid. Not retried.
 */
export class ConfigurationError extends LockboxError {
  /** Names of the missing or invalid settings, e.g. `['BWS_TOKEN']`. */
  readonly missing: string[]

  constructor(message: string, missing: string[]) {
    super(message)
    this.name = 'ConfigurationError'
    this.missing = missing
  }
}

/**
 * The random source, key derivation or cipher primitive failed. The cache
 * falls back to the plaintext tier for the affected entry.
 */
export class CryptoUnavailableError extends LockboxError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CryptoUnavailableError'
  }
}

/** Why an encrypted payload could not be opened. */
export type DecryptFailureReason = 'malformed' | 'key-mismatch' | 'invalid-json' | 'invalid-shape'

/**
 * An encrypted payload could not be opened: malformed wire form, a key from
 * another machine, tampered ciphertext, or a plaintext that is not a secret
 * map. Always handled as a cache miss.
 */
export class DecryptFailureError extends LockboxError {
  readonly reason: DecryptFailureReason

  constructor(message: string, reason: DecryptFailureReason, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DecryptFailureError'
    this.reason = reason
  }
}

/**
 * The secrets provider rejected a request, could not be reached, or answered
 * with a response of unexpected shape. Propagated unchanged and never cached.
 */
export class ProviderError extends LockboxError {
  /** The gateway operation that failed (e.g. `'login'`, `'secrets.list'`). */
  readonly operation: string

  constructor(message: string, operation: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ProviderError'
    this.operation = operation
  }
}

/**
 * A filesystem operation failed due to a permission or access problem.
 */
export class FilesystemError extends LockboxError {
  /**
   * The absolute path of the file or directory that caused the error.
   */
  readonly path: string

  /**
   * The permission that was being applied or required (e.g. `'rw'`, `'rwx'`).
   */
  readonly permission: string

  constructor(message: string, filePath: string, permission: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'FilesystemError'
    this.path = filePath
    this.permission = permission
  }
}
