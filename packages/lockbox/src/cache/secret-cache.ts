/**
 * Time-bounded, encrypted in-memory cache of secret maps.
 *
 * @remarks
 * Entries are keyed by `organizationId:projectId` (an empty project id means
 * every project) and hold either an encrypted payload or, when encryption was
 * unavailable, the plain map. Per key the lifecycle is
 * `empty -> fresh -> expired -> fresh -> ... -> cleared`.
 *
 * Callers always receive a copy. Mutating a returned map never changes what
 * the cache holds.
 */

import type { SecretCipher } from '../crypto/cipher.js'
import type { SecretsGateway } from '../gateway/types.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { EncryptedPayload, SecretMap } from '../types.js'

/** Default time-to-live: five minutes. */
export const DEFAULT_TTL_MS = 300_000

/** The part of {@link SecretCipher} the cache depends on. */
export type CacheCipher = Pick<SecretCipher, 'encrypt' | 'decrypt'>

/** Options for {@link SecretCache}. */
export interface SecretCacheOptions {
  gateway: SecretsGateway
  cipher: CacheCipher
  /** Maximum entry age in milliseconds. Defaults to {@link DEFAULT_TTL_MS}. */
  ttlMs?: number | undefined
  /** Clock in epoch milliseconds. Defaults to `Date.now`. */
  now?: (() => number) | undefined
  logger?: Logger | undefined
}

/** Options for {@link SecretCache.get}. */
export interface CacheGetOptions {
  /** Skip any cached entry and fetch from the gateway. */
  forceRefresh?: boolean | undefined
}

type CachedPayload =
  | { readonly kind: 'sealed'; readonly payload: EncryptedPayload }
  | { readonly kind: 'plain'; readonly secrets: Readonly<SecretMap> }

interface CacheEntry {
  readonly timestamp: number
  readonly payload: CachedPayload
}

/** Compute the cache key for an organization/project pair. */
export function cacheKey(organizationId: string, projectId?: string): string {
  return `${organizationId}:${projectId ?? ''}`
}

/**
 * TTL cache in front of a {@link SecretsGateway}.
 *
 * @remarks
 * Concurrent `get` calls for a key that is being fetched share that fetch.
 * `forceRefresh` always issues its own. Gateway errors propagate and are
 * never cached; encryption and decryption failures are absorbed.
 *
 * @public
 */
export class SecretCache {
  readonly #gateway: SecretsGateway
  readonly #cipher: CacheCipher
  readonly #ttlMs: number
  readonly #now: () => number
  readonly #logger: Logger
  readonly #entries = new Map<string, CacheEntry>()
  readonly #inflight = new Map<string, Promise<SecretMap>>()
  #generation = 0

  constructor(options: SecretCacheOptions) {
    const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`Cache TTL must be a positive number of milliseconds, got ${String(ttlMs)}`)
    }
    this.#gateway = options.gateway
    this.#cipher = options.cipher
    this.#ttlMs = ttlMs
    this.#now = options.now ?? Date.now
    this.#logger = options.logger ?? silentLogger()
  }

  /** Entry time-to-live in milliseconds. */
  get ttlMs(): number {
    return this.#ttlMs
  }

  /** Number of entries currently held, fresh or expired. */
  get size(): number {
    return this.#entries.size
  }

  /** Whether an entry, fresh or expired, exists for the pair. */
  has(organizationId: string, projectId?: string): boolean {
    return this.#entries.has(cacheKey(organizationId, projectId))
  }

  /**
   * Return the secrets for an organization/project pair, from the cache when
   * a fresh entry can be opened, otherwise from the gateway.
   *
   * @throws ProviderError when a fetch is needed and the gateway fails.
   */
  async get(
    organizationId: string,
    projectId?: string,
    options?: CacheGetOptions,
  ): Promise<SecretMap> {
    const key = cacheKey(organizationId, projectId)

    if (options?.forceRefresh !== true) {
      const cached = await this.#readFresh(key)
      if (cached !== undefined) {
        return cached
      }
      const pending = this.#inflight.get(key)
      if (pending !== undefined) {
        return { ...(await pending) }
      }
    }

    return { ...(await this.#refresh(key, organizationId, projectId)) }
  }

  /**
   * Drop every entry. Fetches still in flight complete for their callers but
   * are not stored. Safe to call repeatedly.
   */
  clear(): void {
    this.#generation++
    this.#entries.clear()
    this.#inflight.clear()
  }

  async #readFresh(key: string): Promise<SecretMap | undefined> {
    const entry = this.#entries.get(key)
    if (entry === undefined) {
      return undefined
    }

    const age = this.#now() - entry.timestamp
    if (age >= this.#ttlMs) {
      this.#logger.debug({ key, age }, 'cache entry expired')
      return undefined
    }

    if (entry.payload.kind === 'plain') {
      return { ...entry.payload.secrets }
    }

    const opened = await this.#cipher.decrypt(entry.payload.payload)
    if (!opened.ok) {
      this.#logger.debug(
        { key, reason: opened.error.reason },
        'cache entry could not be decrypted; refetching',
      )
      if (this.#entries.get(key) === entry) {
        this.#entries.delete(key)
      }
      return undefined
    }
    return opened.value
  }

  #refresh(key: string, organizationId: string, projectId: string | undefined): Promise<SecretMap> {
    const fetched = this.#fetchAndStore(key, organizationId, projectId)
    this.#inflight.set(key, fetched)
    const release = (): void => {
      if (this.#inflight.get(key) === fetched) {
        this.#inflight.delete(key)
      }
    }
    void fetched.then(release, release)
    return fetched
  }

  async #fetchAndStore(
    key: string,
    organizationId: string,
    projectId: string | undefined,
  ): Promise<SecretMap> {
    const generation = this.#generation
    this.#logger.debug({ key }, 'fetching secrets from gateway')
    const secrets = { ...(await this.#gateway.fetch(organizationId, projectId)) }
    await this.#store(key, secrets, generation)
    return secrets
  }

  async #store(key: string, secrets: SecretMap, generation: number): Promise<void> {
    const sealed = await this.#cipher.encrypt(secrets)
    let payload: CachedPayload
    if (sealed.ok) {
      payload = { kind: 'sealed', payload: sealed.value }
    } else {
      this.#logger.warn(
        { key, err: sealed.error },
        'cache encryption unavailable; keeping entry as plaintext',
      )
      payload = { kind: 'plain', secrets: { ...secrets } }
    }

    if (generation !== this.#generation) {
      return
    }
    this.#entries.set(key, { timestamp: this.#now(), payload })
  }
}
