/**
 * Linux Secret Service credential store.
 *
 * @remarks
 * Uses the `secret-tool` CLI, which talks to GNOME Keyring or any other
 * Secret Service implementation over D-Bus. Entries carry the attributes
 * `service` and `username`.
 */

import { execCommand, execCommandFull } from '../util/exec.js'
import type { CredentialStore } from './types.js'

const COMMAND_TIMEOUT_MS = 10_000

function attributes(service: string, key: string): string[] {
  return ['service', service, 'username', key]
}

/**
 * Linux secret-tool (Secret Service API) credential store.
 *
 * @remarks
 * Only available on Linux with secret-tool installed and a running Secret
 * Service.
 *
 * @internal
 */
export class SecretToolCredentialStore implements CredentialStore {
  readonly type = 'secret-tool'
  readonly displayName = 'Linux Secret Service (secret-tool)'

  async isAvailable(): Promise<boolean> {
    if (process.platform !== 'linux') {
      return false
    }
    try {
      const result = await execCommandFull('secret-tool', ['--version'], {
        timeoutMs: COMMAND_TIMEOUT_MS,
      })
      return result.exitCode === 0
    } catch {
      return false
    }
  }

  async get(service: string, key: string): Promise<string | undefined> {
    const result = await execCommandFull('secret-tool', ['lookup', ...attributes(service, key)], {
      timeoutMs: COMMAND_TIMEOUT_MS,
    })
    const value = result.stdout.trim()
    if (result.exitCode !== 0 || value === '') {
      return undefined
    }
    return value
  }

  async set(service: string, key: string, value: string): Promise<void> {
    await execCommand(
      'secret-tool',
      ['store', '--label', `lockbox: ${service}/${key}`, ...attributes(service, key)],
      { stdin: value, timeoutMs: COMMAND_TIMEOUT_MS },
    )
  }

  async delete(service: string, key: string): Promise<void> {
    await execCommandFull('secret-tool', ['clear', ...attributes(service, key)], {
      timeoutMs: COMMAND_TIMEOUT_MS,
    })
  }
}
