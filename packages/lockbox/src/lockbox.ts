/**
 * Lockbox main class. Wires configuration, machine identity, the cipher,
 * the OS credential store and the secrets gateway around a {@link SecretCache}.
 */

import { SecretCache } from './cache/secret-cache.js'
import { resolveCacheTtlMs, resolveGatewayConfig, resolveOrganizationId } from './config.js'
import type { Environment } from './config.js'
import { SecretCipher } from './crypto/cipher.js'
import { defaultCredentialStore } from './credentials/probing-store.js'
import type { CredentialStore } from './credentials/types.js'
import { applyToEnvironment } from './env.js'
import { LockboxError } from './errors.js'
import { connectSecretsManager } from './gateway/sdk-client.js'
import type { ConnectOptions } from './gateway/sdk-client.js'
import type { SecretsGateway } from './gateway/types.js'
import { MachineIdentity } from './identity/machine-id.js'
import { createLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { GatewayConfig, ProjectSummary, SecretMap } from './types.js'

/** Connects a gateway from resolved configuration. */
export type GatewayConnector = (
  config: GatewayConfig,
  options: ConnectOptions,
) => Promise<SecretsGateway>

/** Options for {@link Lockbox.init}. */
export interface LockboxOptions {
  /** Environment to read configuration from. Defaults to `process.env`. */
  env?: Environment | undefined
  logger?: Logger | undefined
  /** OS credential store for bootstrap values. Defaults to the platform's probing store. */
  credentialStore?: CredentialStore | undefined
  identity?: MachineIdentity | undefined
  /**
   * Gateway to fetch from. When omitted, a Bitwarden SDK connection is made
   * from configuration on first use.
   */
  gateway?: SecretsGateway | undefined
  /** Replaces the SDK connection when no `gateway` is given. */
  connect?: GatewayConnector | undefined
  /** Cache TTL in milliseconds. Defaults to `LOCKBOX_CACHE_TTL` or five minutes. */
  ttlMs?: number | undefined
  /** Clock in epoch milliseconds. */
  now?: (() => number) | undefined
  /** Clear the cache when the process exits. Defaults to `true`. */
  clearOnExit?: boolean | undefined
}

/** Options for {@link Lockbox.get}. */
export interface GetSecretsOptions {
  /** Defaults to `ORGANIZATION_ID` or the value in the credential store. */
  organizationId?: string | undefined
  /** Narrow to one project. Unscoped secrets are always included. */
  projectId?: string | undefined
  /** Bypass the cache. */
  refresh?: boolean | undefined
}

/** Options for {@link Lockbox.loadEnv}. */
export interface LoadEnvOptions extends GetSecretsOptions {
  /** Replace variables that are already set. Defaults to `false`. */
  override?: boolean | undefined
  /** Environment to write to. Defaults to `process.env`. */
  target?: Environment | undefined
}

/** Options for {@link Lockbox.loadAllEnv}. */
export type LoadAllEnvOptions = Omit<LoadEnvOptions, 'projectId'>

/**
 * Resolves one gateway per organization on first use and reuses it.
 */
class ConnectingGateway implements SecretsGateway {
  readonly #connect: (organizationId: string) => Promise<SecretsGateway>
  readonly #connections = new Map<string, Promise<SecretsGateway>>()

  constructor(connect: (organizationId: string) => Promise<SecretsGateway>) {
    this.#connect = connect
  }

  async ready(organizationId: string): Promise<SecretsGateway> {
    let connection = this.#connections.get(organizationId)
    if (connection === undefined) {
      connection = this.#connect(organizationId)
      this.#connections.set(organizationId, connection)
    }
    try {
      return await connection
    } catch (error) {
      // Let the next call retry instead of replaying the failure.
      if (this.#connections.get(organizationId) === connection) {
        this.#connections.delete(organizationId)
      }
      throw error
    }
  }

  async fetch(organizationId: string, projectId?: string): Promise<SecretMap> {
    const gateway = await this.ready(organizationId)
    return gateway.fetch(organizationId, projectId)
  }

  async listProjects(organizationId: string): Promise<ProjectSummary[]> {
    const gateway = await this.ready(organizationId)
    return gateway.listProjects(organizationId)
  }
}

/**
 * Entry point for lockbox: secrets for an organization/project, served from a
 * machine-bound encrypted cache.
 *
 * @remarks
 * An instance is a session. {@link Lockbox.close} clears the cache and
 * detaches the exit hook; {@link withLockbox} guarantees that on every exit
 * path.
 *
 * @public
 */
export class Lockbox {
  readonly #env: Environment
  readonly #logger: Logger
  readonly #store: CredentialStore
  readonly #identity: MachineIdentity
  readonly #gateway: ConnectingGateway
  readonly #cache: SecretCache
  #exitHook: (() => void) | undefined
  #closed = false

  private constructor(
    env: Environment,
    logger: Logger,
    store: CredentialStore,
    identity: MachineIdentity,
    gateway: ConnectingGateway,
    cache: SecretCache,
  ) {
    this.#env = env
    this.#logger = logger
    this.#store = store
    this.#identity = identity
    this.#gateway = gateway
    this.#cache = cache
  }

  /**
   * Create a session.
   *
   * Rejects with ConfigurationError if `LOCKBOX_CACHE_TTL` is invalid.
   */
  static init(options?: LockboxOptions): Promise<Lockbox> {
    return Promise.resolve().then(() => Lockbox.#create(options))
  }

  static #create(options: LockboxOptions | undefined): Lockbox {
    const env = options?.env ?? process.env
    const logger = options?.logger ?? createLogger()
    const store = options?.credentialStore ?? defaultCredentialStore({ logger })
    const identity = options?.identity ?? new MachineIdentity({ logger })
    const ttlMs = options?.ttlMs ?? resolveCacheTtlMs(env)

    const injected = options?.gateway
    const connect = options?.connect ?? connectSecretsManager
    const gateway = new ConnectingGateway(async (organizationId) => {
      if (injected !== undefined) {
        return injected
      }
      const config = await resolveGatewayConfig(env, store, organizationId)
      return connect(config, { logger })
    })

    const cache = new SecretCache({
      gateway,
      cipher: new SecretCipher(() => identity.resolve()),
      ttlMs,
      now: options?.now,
      logger,
    })

    const lockbox = new Lockbox(env, logger, store, identity, gateway, cache)
    if (options?.clearOnExit !== false) {
      lockbox.#attachExitHook()
    }
    return lockbox
  }

  /** The machine identity used for cache encryption. */
  get identity(): MachineIdentity {
    return this.#identity
  }

  /** The credential store used for bootstrap values. */
  get credentialStore(): CredentialStore {
    return this.#store
  }

  /** Whether {@link Lockbox.close} has been called. */
  get closed(): boolean {
    return this.#closed
  }

  /**
   * Return the secrets of an organization, narrowed to a project when given.
   * The result is a copy.
   *
   * @throws ConfigurationError if the organization or provider settings are missing.
   * @throws ProviderError if a fetch is needed and the provider fails.
   */
  async get(options?: GetSecretsOptions): Promise<SecretMap> {
    this.#assertOpen()
    const organizationId = await resolveOrganizationId(options?.organizationId, this.#env, this.#store)
    await this.#gateway.ready(organizationId)
    return this.#cache.get(organizationId, options?.projectId, {
      forceRefresh: options?.refresh,
    })
  }

  /**
   * Load secrets into environment variables.
   * @returns The variable names written.
   */
  async loadEnv(options?: LoadEnvOptions): Promise<string[]> {
    const secrets = await this.get(options)
    return applyToEnvironment(secrets, { override: options?.override, target: options?.target })
  }

  /**
   * Load the secrets of every project of the organization into environment
   * variables. When two projects define the same name, the project listed
   * later wins.
   *
   * @returns The variable names written.
   */
  async loadAllEnv(options?: LoadAllEnvOptions): Promise<string[]> {
    this.#assertOpen()
    const organizationId = await resolveOrganizationId(options?.organizationId, this.#env, this.#store)
    const projects = await this.listProjects(organizationId)

    let merged: SecretMap = {}
    for (const project of projects) {
      const secrets = await this.#cache.get(organizationId, project.id, {
        forceRefresh: options?.refresh,
      })
      merged = { ...merged, ...secrets }
    }
    return applyToEnvironment(merged, { override: options?.override, target: options?.target })
  }

  /** List the projects of an organization. */
  async listProjects(organizationId?: string): Promise<ProjectSummary[]> {
    this.#assertOpen()
    const resolved = await resolveOrganizationId(organizationId, this.#env, this.#store)
    return this.#gateway.listProjects(resolved)
  }

  /** Clear the cache and end the session. Safe to call repeatedly. */
  close(): void {
    this.#cache.clear()
    if (this.#exitHook !== undefined) {
      process.removeListener('exit', this.#exitHook)
      this.#exitHook = undefined
    }
    if (!this.#closed) {
      this.#closed = true
      this.#logger.debug({}, 'session closed')
    }
  }

  #attachExitHook(): void {
    const hook = (): void => {
      this.#cache.clear()
    }
    process.once('exit', hook)
    this.#exitHook = hook
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new LockboxError('This lockbox session has been closed')
    }
  }
}

/**
 * Run `fn` with a fresh session and close it afterwards, whether `fn`
 * resolves or rejects.
 *
 * @public
 */
export async function withLockbox<T>(
  options: LockboxOptions | undefined,
  fn: (lockbox: Lockbox) => Promise<T>,
): Promise<T> {
  const lockbox = await Lockbox.init(options)
  try {
    return await fn(lockbox)
  } finally {
    lockbox.close()
  }
}
