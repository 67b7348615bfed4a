/**
 * Credential store that picks the first available OS facility.
 */

import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import { currentPlatform } from '../util/platform.js'
import type { Platform } from '../util/platform.js'
import { DpapiCredentialStore } from './dpapi-store.js'
import { KeychainCredentialStore } from './keychain-store.js'
import { SecretToolCredentialStore } from './secret-tool-store.js'
import type { CredentialStore } from './types.js'

/** Options for {@link ProbingCredentialStore}. */
export interface ProbingCredentialStoreOptions {
  logger?: Logger | undefined
}

/**
 * Wraps candidate stores and probes them once, on first use.
 *
 * @remarks
 * The first candidate whose `isAvailable()` resolves `true` serves every
 * later call. When none is available every operation degrades to
 * absent/no-op. Failures of the chosen store are logged and degrade the same
 * way, so a broken keyring never interrupts a secrets request.
 *
 * @public
 */
export class ProbingCredentialStore implements CredentialStore {
  readonly type = 'probing'
  readonly displayName = 'OS credential store'
  readonly #candidates: readonly CredentialStore[]
  readonly #logger: Logger
  #selected: Promise<CredentialStore | undefined> | undefined

  constructor(candidates: readonly CredentialStore[], options?: ProbingCredentialStoreOptions) {
    this.#candidates = candidates
    this.#logger = options?.logger ?? silentLogger()
  }

  /** Resolve the store in use, or `undefined` when none is available. */
  active(): Promise<CredentialStore | undefined> {
    this.#selected ??= this.#probe()
    return this.#selected
  }

  async isAvailable(): Promise<boolean> {
    return (await this.active()) !== undefined
  }

  async get(service: string, key: string): Promise<string | undefined> {
    const store = await this.active()
    if (store === undefined) {
      return undefined
    }
    try {
      return await store.get(service, key)
    } catch (error) {
      this.#logger.warn({ store: store.type, service, key, err: error }, 'credential store read failed')
      return undefined
    }
  }

  async set(service: string, key: string, value: string): Promise<void> {
    const store = await this.active()
    if (store === undefined) {
      return
    }
    try {
      await store.set(service, key, value)
    } catch (error) {
      this.#logger.warn({ store: store.type, service, key, err: error }, 'credential store write failed')
    }
  }

  async delete(service: string, key: string): Promise<void> {
    const store = await this.active()
    if (store === undefined) {
      return
    }
    try {
      await store.delete(service, key)
    } catch (error) {
      this.#logger.warn({ store: store.type, service, key, err: error }, 'credential store delete failed')
    }
  }

  async #probe(): Promise<CredentialStore | undefined> {
    for (const candidate of this.#candidates) {
      let available: boolean
      try {
        available = await candidate.isAvailable()
      } catch (error) {
        this.#logger.debug({ store: candidate.type, err: error }, 'credential store probe failed')
        available = false
      }
      if (available) {
        this.#logger.debug({ store: candidate.type }, 'using credential store')
        return candidate
      }
    }
    this.#logger.debug({}, 'no credential store available; using environment only')
    return undefined
  }
}

/** Candidate stores for a platform, most preferred first. */
export function platformCredentialStores(platform: Platform = currentPlatform()): CredentialStore[] {
  switch (platform) {
    case 'darwin':
      return [new KeychainCredentialStore()]
    case 'win32':
      return [new DpapiCredentialStore()]
    case 'linux':
      return [new SecretToolCredentialStore()]
  }
}

/** The probing store over the current platform's candidates. */
export function defaultCredentialStore(options?: ProbingCredentialStoreOptions): ProbingCredentialStore {
  return new ProbingCredentialStore(platformCredentialStores(), options)
}
