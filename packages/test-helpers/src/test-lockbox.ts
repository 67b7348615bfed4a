/**
 * Pre-configured Lockbox for consumer tests.
 */

import { Lockbox, silentLogger } from 'lockbox'
import type { Environment, MachineIdentity, ProjectSummary, SecretRecord } from 'lockbox'
import { InMemoryCredentialStore } from './in-memory-credential-store.js'
import { ScriptedSecretsGateway } from './scripted-gateway.js'

/** Organization id used when none is given. */
export const TEST_ORGANIZATION_ID = 'test-org'

/**
 * Options for creating a {@link TestLockbox}.
 * @public
 */
export interface TestLockboxOptions {
  records?: SecretRecord[] | undefined
  projects?: ProjectSummary[] | undefined
  /** Defaults to {@link TEST_ORGANIZATION_ID}. */
  organizationId?: string | undefined
  ttlMs?: number | undefined
  now?: (() => number) | undefined
  identity?: MachineIdentity | undefined
}

/**
 * A real `Lockbox` wired to an {@link InMemoryCredentialStore} and a
 * {@link ScriptedSecretsGateway}, with the organization id set in its
 * environment. No exit hook is attached.
 *
 * @example
 * ```ts
 * const box = await TestLockbox.create({
 *   records: [{ id: '1', key: 'A', value: '1', projectId: null }],
 * })
 * await box.lockbox.get() // { A: '1' }
 * box.close()
 * ```
 *
 * @public
 */
export class TestLockbox {
  readonly lockbox: Lockbox
  readonly gateway: ScriptedSecretsGateway
  readonly credentialStore: InMemoryCredentialStore
  readonly env: Environment

  private constructor(
    lockbox: Lockbox,
    gateway: ScriptedSecretsGateway,
    credentialStore: InMemoryCredentialStore,
    env: Environment,
  ) {
    this.lockbox = lockbox
    this.gateway = gateway
    this.credentialStore = credentialStore
    this.env = env
  }

  static async create(options?: TestLockboxOptions): Promise<TestLockbox> {
    const gateway = new ScriptedSecretsGateway({
      records: options?.records,
      projects: options?.projects,
    })
    const credentialStore = new InMemoryCredentialStore()
    const env: Environment = {
      ORGANIZATION_ID: options?.organizationId ?? TEST_ORGANIZATION_ID,
    }

    const lockbox = await Lockbox.init({
      env,
      gateway,
      credentialStore,
      identity: options?.identity,
      logger: silentLogger(),
      ttlMs: options?.ttlMs,
      now: options?.now,
      clearOnExit: false,
    })

    return new TestLockbox(lockbox, gateway, credentialStore, env)
  }

  /** Close the underlying session. */
  close(): void {
    this.lockbox.close()
  }
}
