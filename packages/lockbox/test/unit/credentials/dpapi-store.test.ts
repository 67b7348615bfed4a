import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

vi.mock('../../../src/util/exec.js', () => ({
  execCommand: vi.fn(),
  execCommandFull: vi.fn(),
}))

import { execCommand } from '../../../src/util/exec.js'
import { DpapiCredentialStore } from '../../../src/credentials/dpapi-store.js'

const mockExecCommand = vi.mocked(execCommand)

function entryName(service: string, key: string): string {
  return `${Buffer.from(service).toString('hex')}.${Buffer.from(key).toString('hex')}.enc`
}

describe('DpapiCredentialStore', () => {
  let tempDir: string
  let store: DpapiCredentialStore

  beforeEach(async () => {
    vi.clearAllMocks()
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lockbox-dpapi-test-'))
    store = new DpapiCredentialStore({ storageDir: tempDir })
  })

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('should be unavailable off Windows', async () => {
    if (process.platform === 'win32') return
    expect(await store.isAvailable()).toBe(false)
  })

  it('should return undefined without calling PowerShell when no entry exists', async () => {
    expect(await store.get('lockbox', 'organization_id')).toBeUndefined()
    expect(mockExecCommand).not.toHaveBeenCalled()
  })

  it('should unprotect an existing entry', async () => {
    await fs.writeFile(path.join(tempDir, entryName('lockbox', 'organization_id')), 'blob')
    mockExecCommand.mockResolvedValue('org-1')
    expect(await store.get('lockbox', 'organization_id')).toBe('org-1')
    const [command, args] = mockExecCommand.mock.calls[0] ?? []
    expect(command).toBe('powershell')
    expect(args?.[2]).toContain('Unprotect')
  })

  it('should pass the value on stdin, never on the command line', async () => {
    mockExecCommand.mockResolvedValue('')
    await store.set('lockbox', 'organization_id', 'org-1')
    const [, args, options] = mockExecCommand.mock.calls[0] ?? []
    expect(options).toEqual({ stdin: 'org-1', timeoutMs: 15_000 })
    expect(args?.join(' ')).not.toContain('org-1')
    expect(args?.[2]).toContain(`'${path.join(tempDir, entryName('lockbox', 'organization_id'))}'`)
  })

  it('should delete an entry and ignore a missing one', async () => {
    const entry = path.join(tempDir, entryName('lockbox', 'k'))
    await fs.writeFile(entry, 'blob')
    await store.delete('lockbox', 'k')
    await expect(fs.access(entry)).rejects.toThrow()
    await expect(store.delete('lockbox', 'k')).resolves.toBeUndefined()
  })
})
