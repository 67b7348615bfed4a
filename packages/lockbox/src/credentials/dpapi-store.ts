/**
 * Windows DPAPI credential store.
 *
 * @remarks
 * Values are protected with the Windows Data Protection API through
 * PowerShell, scoped to the current user, and written to
 * `~/.lockbox/dpapi/<hex service>.<hex key>.enc`. The plaintext is passed on
 * stdin so it never appears in a command line.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { execCommand, execCommandFull } from '../util/exec.js'
import type { CredentialStore } from './types.js'

const COMMAND_TIMEOUT_MS = 15_000

/** Options for {@link DpapiCredentialStore}. */
export interface DpapiCredentialStoreOptions {
  /** Directory holding the protected blobs. Defaults to `~/.lockbox/dpapi`. */
  storageDir?: string | undefined
}

function hex(value: string): string {
  return Buffer.from(value, 'utf8').toString('hex')
}

/** Quote a path as a PowerShell single-quoted literal. */
function psLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`
}

/**
 * Windows DPAPI credential store.
 *
 * @remarks
 * Only available on Windows.
 *
 * @internal
 */
export class DpapiCredentialStore implements CredentialStore {
  readonly type = 'dpapi'
  readonly displayName = 'Windows DPAPI'
  readonly #storageDir: string

  constructor(options?: DpapiCredentialStoreOptions) {
    this.#storageDir = options?.storageDir ?? path.join(os.homedir(), '.lockbox', 'dpapi')
  }

  #entryPath(service: string, key: string): string {
    return path.join(this.#storageDir, `${hex(service)}.${hex(key)}.enc`)
  }

  async isAvailable(): Promise<boolean> {
    if (process.platform !== 'win32') {
      return false
    }
    try {
      const result = await execCommandFull(
        'powershell',
        [
          '-NoProfile',
          '-Command',
          'Add-Type -AssemblyName System.Security; [System.Security.Cryptography.ProtectedData] | Out-Null; exit 0',
        ],
        { timeoutMs: COMMAND_TIMEOUT_MS },
      )
      return result.exitCode === 0
    } catch {
      return false
    }
  }

  async get(service: string, key: string): Promise<string | undefined> {
    const entryPath = this.#entryPath(service, key)
    try {
      await fs.access(entryPath)
    } catch {
      return undefined
    }

    const script = [
      'Add-Type -AssemblyName System.Security',
      `$encrypted = [System.IO.File]::ReadAllBytes(${psLiteral(entryPath)})`,
      '$scope = [System.Security.Cryptography.DataProtectionScope]::CurrentUser',
      '$bytes = [System.Security.Cryptography.ProtectedData]::Unprotect($encrypted, $null, $scope)',
      '[Console]::Out.Write([System.Text.Encoding]::UTF8.GetString($bytes))',
    ].join('; ')

    return execCommand('powershell', ['-NoProfile', '-Command', script], {
      timeoutMs: COMMAND_TIMEOUT_MS,
    })
  }

  async set(service: string, key: string, value: string): Promise<void> {
    await fs.mkdir(this.#storageDir, { recursive: true })
    const entryPath = this.#entryPath(service, key)

    const script = [
      'Add-Type -AssemblyName System.Security',
      '$plain = [Console]::In.ReadToEnd()',
      '$bytes = [System.Text.Encoding]::UTF8.GetBytes($plain)',
      '$scope = [System.Security.Cryptography.DataProtectionScope]::CurrentUser',
      '$encrypted = [System.Security.Cryptography.ProtectedData]::Protect($bytes, $null, $scope)',
      `[System.IO.File]::WriteAllBytes(${psLiteral(entryPath)}, $encrypted)`,
    ].join('; ')

    await execCommand('powershell', ['-NoProfile', '-Command', script], {
      stdin: value,
      timeoutMs: COMMAND_TIMEOUT_MS,
    })
  }

  async delete(service: string, key: string): Promise<void> {
    try {
      await fs.unlink(this.#entryPath(service, key))
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return
      }
      throw err
    }
  }
}
