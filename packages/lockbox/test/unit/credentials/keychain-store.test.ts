import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { ExecCommandResult } from '../../../src/util/exec.js'

vi.mock('../../../src/util/exec.js', () => ({
  execCommand: vi.fn(),
  execCommandFull: vi.fn(),
}))

import { execCommand, execCommandFull } from '../../../src/util/exec.js'
import { KeychainCredentialStore } from '../../../src/credentials/keychain-store.js'

const mockExecCommand = vi.mocked(execCommand)
const mockExecCommandFull = vi.mocked(execCommandFull)
const originalPlatform = process.platform

function makeResult(exitCode: number, stdout = '', stderr = ''): ExecCommandResult {
  return { exitCode, stdout, stderr }
}

function setPlatform(value: string): void {
  Object.defineProperty(process, 'platform', { value, configurable: true })
}

describe('KeychainCredentialStore', () => {
  let store: KeychainCredentialStore

  beforeEach(() => {
    store = new KeychainCredentialStore()
    vi.clearAllMocks()
  })

  afterEach(() => {
    setPlatform(originalPlatform)
  })

  describe('isAvailable', () => {
    it('should return true on darwin when security succeeds', async () => {
      setPlatform('darwin')
      mockExecCommandFull.mockResolvedValue(makeResult(0, '"/Users/test/login.keychain-db"'))
      expect(await store.isAvailable()).toBe(true)
      expect(mockExecCommandFull).toHaveBeenCalledWith('security', ['list-keychains'], {
        timeoutMs: 10_000,
      })
    })

    it('should return false on other platforms without running anything', async () => {
      setPlatform('linux')
      expect(await store.isAvailable()).toBe(false)
      expect(mockExecCommandFull).not.toHaveBeenCalled()
    })

    it('should return false when security cannot be run', async () => {
      setPlatform('darwin')
      mockExecCommandFull.mockRejectedValue(new Error('ENOENT'))
      expect(await store.isAvailable()).toBe(false)
    })
  })

  describe('get', () => {
    it('should decode the stored value', async () => {
      mockExecCommandFull.mockResolvedValue(
        makeResult(0, `${Buffer.from('org-1').toString('base64')}\n`),
      )
      expect(await store.get('lockbox', 'organization_id')).toBe('org-1')
      expect(mockExecCommandFull).toHaveBeenCalledWith(
        'security',
        ['find-generic-password', '-a', 'organization_id', '-s', 'lockbox', '-w'],
        { timeoutMs: 10_000 },
      )
    })

    it('should return undefined when the item does not exist', async () => {
      mockExecCommandFull.mockResolvedValue(makeResult(44, '', 'could not be found'))
      expect(await store.get('lockbox', 'organization_id')).toBeUndefined()
    })
  })

  describe('set', () => {
    it('should store the value base64-encoded, updating in place', async () => {
      mockExecCommand.mockResolvedValue('')
      await store.set('lockbox_org-1', 'state_file', '/var/state.json')
      expect(mockExecCommand).toHaveBeenCalledWith(
        'security',
        [
          'add-generic-password',
          '-U',
          '-a',
          'state_file',
          '-s',
          'lockbox_org-1',
          '-w',
          Buffer.from('/var/state.json').toString('base64'),
        ],
        { timeoutMs: 10_000 },
      )
    })

    it('should propagate failures', async () => {
      mockExecCommand.mockRejectedValue(new Error('Command failed with exit code 1: denied'))
      await expect(store.set('lockbox', 'k', 'v')).rejects.toThrow('denied')
    })
  })

  describe('delete', () => {
    it('should ignore a missing item', async () => {
      mockExecCommandFull.mockResolvedValue(makeResult(44))
      await expect(store.delete('lockbox', 'k')).resolves.toBeUndefined()
      expect(mockExecCommandFull).toHaveBeenCalledWith(
        'security',
        ['delete-generic-password', '-a', 'k', '-s', 'lockbox'],
        { timeoutMs: 10_000 },
      )
    })
  })
})
