/**
 * In-memory credential store for testing.
 */

import type { CredentialStore } from 'lockbox'

/** Options for {@link InMemoryCredentialStore}. */
export interface InMemoryCredentialStoreOptions {
  /** What `isAvailable()` reports. Defaults to `true`. */
  available?: boolean | undefined
}

/**
 * A `CredentialStore` held in a plain `Map`, with no OS dependencies.
 *
 * @public
 */
export class InMemoryCredentialStore implements CredentialStore {
  readonly type = 'memory'
  readonly displayName = 'In-Memory Credential Store'
  readonly #entries = new Map<string, string>()
  readonly #available: boolean

  constructor(options?: InMemoryCredentialStoreOptions) {
    this.#available = options?.available ?? true
  }

  isAvailable(): Promise<boolean> {
    return Promise.resolve(this.#available)
  }

  get(service: string, key: string): Promise<string | undefined> {
    return Promise.resolve(this.#entries.get(entryKey(service, key)))
  }

  set(service: string, key: string, value: string): Promise<void> {
    this.#entries.set(entryKey(service, key), value)
    return Promise.resolve()
  }

  delete(service: string, key: string): Promise<void> {
    this.#entries.delete(entryKey(service, key))
    return Promise.resolve()
  }

  /** Remove every entry. Useful for test teardown. */
  clear(): void {
    this.#entries.clear()
  }

  /** The number of entries currently stored. */
  get size(): number {
    return this.#entries.size
  }
}

function entryKey(service: string, key: string): string {
  return `${service}\u0000${key}`
}
