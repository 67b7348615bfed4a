import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { Mock } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { Lockbox, withLockbox } from '../../src/lockbox.js'
import type { GatewayConnector, LockboxOptions } from '../../src/lockbox.js'
import { ConfigurationError, LockboxError, ProviderError } from '../../src/errors.js'
import { silentLogger } from '../../src/logger.js'
import type { MachineIdentity } from '../../src/identity/machine-id.js'
import { fakeGateway, fixedIdentity, MemoryStore } from '../helpers/fakes.js'
import type { FakeGateway } from '../helpers/fakes.js'

describe('Lockbox', () => {
  let tempDir: string
  let identity: MachineIdentity
  let store: MemoryStore
  let gateway: FakeGateway
  const opened: Lockbox[] = []

  async function open(overrides?: LockboxOptions): Promise<Lockbox> {
    const lockbox = await Lockbox.init({
      env: { ORGANIZATION_ID: 'org-1' },
      credentialStore: store,
      identity,
      gateway,
      logger: silentLogger(),
      clearOnExit: false,
      ...overrides,
    })
    opened.push(lockbox)
    return lockbox
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lockbox-facade-test-'))
    identity = await fixedIdentity(tempDir)
    store = new MemoryStore()
    gateway = fakeGateway({ A: '1', B: '2' })
  })

  afterEach(async () => {
    for (const lockbox of opened.splice(0)) {
      lockbox.close()
    }
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  describe('get', () => {
    it('should fetch once and then serve from the cache', async () => {
      const lockbox = await open()
      expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
      expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
      expect(gateway.fetch).toHaveBeenCalledTimes(1)
      expect(gateway.fetch).toHaveBeenCalledWith('org-1', undefined)
    })

    it('should fetch again on refresh', async () => {
      const lockbox = await open()
      await lockbox.get()
      gateway.fetch.mockResolvedValueOnce({ A: 'rotated' })
      expect(await lockbox.get({ refresh: true })).toEqual({ A: 'rotated' })
      expect(gateway.fetch).toHaveBeenCalledTimes(2)
    })

    it('should pass the project and an explicit organization through', async () => {
      const lockbox = await open()
      await lockbox.get({ organizationId: 'org-2', projectId: 'web' })
      expect(gateway.fetch).toHaveBeenCalledWith('org-2', 'web')
    })

    it('should use the organization from the credential store', async () => {
      await store.set('lockbox', 'organization_id', 'stored-org')
      const lockbox = await open({ env: {} })
      await lockbox.get()
      expect(gateway.fetch).toHaveBeenCalledWith('stored-org', undefined)
    })

    it('should fail without an organization before consulting the gateway', async () => {
      const lockbox = await open({ env: {} })
      await expect(lockbox.get()).rejects.toThrow(ConfigurationError)
      expect(gateway.fetch).not.toHaveBeenCalled()
    })

    it('should expire entries after the TTL', async () => {
      let clock = 0
      const lockbox = await open({ ttlMs: 1000, now: () => clock })
      await lockbox.get()
      clock = 999
      await lockbox.get()
      clock = 1000
      await lockbox.get()
      expect(gateway.fetch).toHaveBeenCalledTimes(2)
    })

    it('should read the TTL from LOCKBOX_CACHE_TTL', async () => {
      let clock = 0
      const lockbox = await open({
        env: { ORGANIZATION_ID: 'org-1', LOCKBOX_CACHE_TTL: '2' },
        now: () => clock,
      })
      await lockbox.get()
      clock = 1999
      await lockbox.get()
      expect(gateway.fetch).toHaveBeenCalledTimes(1)
      clock = 2000
      await lockbox.get()
      expect(gateway.fetch).toHaveBeenCalledTimes(2)
    })

    it('should reject an invalid LOCKBOX_CACHE_TTL at init', async () => {
      await expect(open({ env: { LOCKBOX_CACHE_TTL: 'never' } })).rejects.toThrow(ConfigurationError)
    })
  })

  describe('connecting from configuration', () => {
    let connect: Mock<GatewayConnector>

    beforeEach(() => {
      connect = vi.fn<GatewayConnector>(() => Promise.resolve(gateway))
    })

    it('should report missing provider settings without connecting', async () => {
      const lockbox = await open({ gateway: undefined, connect })
      const error = await lockbox.get().catch((e: unknown) => e)
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.missing).toEqual(['BWS_TOKEN', 'STATE_FILE'])
      }
      expect(connect).not.toHaveBeenCalled()
    })

    it('should connect once with the resolved settings', async () => {
      await store.set('lockbox_org-1', 'state_file', '/var/lib/state.json')
      const lockbox = await open({
        gateway: undefined,
        connect,
        env: { ORGANIZATION_ID: 'org-1', BWS_TOKEN: 'test-token' },
      })
      await lockbox.get()
      await lockbox.get({ refresh: true })
      expect(connect).toHaveBeenCalledTimes(1)
      expect(connect.mock.calls[0]?.[0]).toEqual({
        apiUrl: 'https://api.bitwarden.com',
        identityUrl: 'https://identity.bitwarden.com',
        accessToken: 'test-token',
        stateFile: '/var/lib/state.json',
      })
    })

    it('should retry a connection that failed', async () => {
      connect.mockRejectedValueOnce(new ProviderError('login refused', 'login'))
      const lockbox = await open({
        gateway: undefined,
        connect,
        env: { ORGANIZATION_ID: 'org-1', BWS_TOKEN: 'test-token', STATE_FILE: '/tmp/s.json' },
      })
      await expect(lockbox.get()).rejects.toThrow('login refused')
      expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
      expect(connect).toHaveBeenCalledTimes(2)
    })
  })

  describe('loadEnv', () => {
    it('should write secrets that are not already set', async () => {
      const lockbox = await open()
      const target: Record<string, string | undefined> = { A: 'original' }
      expect(await lockbox.loadEnv({ target })).toEqual(['B'])
      expect(target).toEqual({ A: 'original', B: '2' })
    })

    it('should replace existing variables with override', async () => {
      const lockbox = await open()
      const target: Record<string, string | undefined> = { A: 'original' }
      expect(await lockbox.loadEnv({ target, override: true })).toEqual(['A', 'B'])
      expect(target.A).toBe('1')
    })
  })

  describe('loadAllEnv', () => {
    it('should load every project of the organization', async () => {
      gateway = fakeGateway({}, [
        { id: 'web', name: 'Web', creationDate: '' },
        { id: 'jobs', name: 'Jobs', creationDate: '' },
      ])
      gateway.fetch.mockImplementation((_org, projectId) =>
        Promise.resolve(projectId === 'web' ? { WEB: 'w', SHARED: 'from-web' } : { JOBS: 'j', SHARED: 'from-jobs' }),
      )
      const lockbox = await open()
      const target: Record<string, string | undefined> = {}
      expect(await lockbox.loadAllEnv({ target })).toEqual(['WEB', 'SHARED', 'JOBS'])
      expect(target).toEqual({ WEB: 'w', SHARED: 'from-jobs', JOBS: 'j' })
      expect(gateway.fetch.mock.calls).toEqual([
        ['org-1', 'web'],
        ['org-1', 'jobs'],
      ])
    })
  })

  describe('listProjects', () => {
    it('should list the projects of the resolved organization', async () => {
      gateway = fakeGateway({}, [{ id: 'p1', name: 'Web', creationDate: '2024-01-01' }])
      const lockbox = await open()
      expect(await lockbox.listProjects()).toEqual([{ id: 'p1', name: 'Web', creationDate: '2024-01-01' }])
      expect(gateway.listProjects).toHaveBeenCalledWith('org-1')
    })
  })

  describe('close', () => {
    it('should end the session and tolerate repeated calls', async () => {
      const lockbox = await open()
      await lockbox.get()
      lockbox.close()
      lockbox.close()
      expect(lockbox.closed).toBe(true)
      await expect(lockbox.get()).rejects.toThrow(LockboxError)
    })

    it('should attach an exit hook and remove it on close', async () => {
      const before = process.listenerCount('exit')
      const lockbox = await open({ clearOnExit: true })
      expect(process.listenerCount('exit')).toBe(before + 1)
      lockbox.close()
      expect(process.listenerCount('exit')).toBe(before)
    })
  })

  describe('withLockbox', () => {
    const options = (): LockboxOptions => ({
      env: { ORGANIZATION_ID: 'org-1' },
      credentialStore: store,
      identity,
      gateway,
      logger: silentLogger(),
      clearOnExit: false,
    })

    it('should return the result and close the session', async () => {
      let session: Lockbox | undefined
      const secrets = await withLockbox(options(), (lockbox) => {
        session = lockbox
        return lockbox.get()
      })
      expect(secrets).toEqual({ A: '1', B: '2' })
      expect(session?.closed).toBe(true)
    })

    it('should close the session when the callback throws', async () => {
      let session: Lockbox | undefined
      await expect(
        withLockbox(options(), (lockbox) => {
          session = lockbox
          return Promise.reject(new Error('caller failed'))
        }),
      ).rejects.toThrow('caller failed')
      expect(session?.closed).toBe(true)
    })
  })

  it('should satisfy the end-to-end scenario', async () => {
    let clock = 0
    const lockbox = await open({ ttlMs: 300_000, now: () => clock })

    expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
    clock = 10_000
    expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
    expect(gateway.fetch).toHaveBeenCalledTimes(1)

    clock = 300_001
    expect(await lockbox.get()).toEqual({ A: '1', B: '2' })
    expect(gateway.fetch).toHaveBeenCalledTimes(2)
  })
})
