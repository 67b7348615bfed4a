/**
 * macOS Keychain credential store.
 *
 * @remarks
 * Values are stored base64-encoded as generic passwords through the
 * `security` CLI, with the service as the Keychain service name and the key as
 * the account.
 */

import { execCommand, execCommandFull } from '../util/exec.js'
import type { CredentialStore } from './types.js'

const COMMAND_TIMEOUT_MS = 10_000

/**
 * macOS Keychain credential store.
 *
 * @remarks
 * Only available on Darwin (macOS).
 *
 * @public
 */
export class KeychainCredentialStore implements CredentialStore {
  readonly type = 'keychain'
  readonly displayName = 'macOS Keychain'

  async isAvailable(): Promise<boolean> {
    if (process.platform !== 'darwin') {
      return false
    }
    try {
      const result = await execCommandFull('security', ['list-keychains'], { timeoutMs: COMMAND_TIMEOUT_MS })
      return result.exitCode === 0
    } catch {
      return false
    }
  }

  async get(service: string, key: string): Promise<string | undefined> {
    const result = await execCommandFull(
      'security',
      ['find-generic-password', '-a', key, '-s', service, '-w'],
      { timeoutMs: COMMAND_TIMEOUT_MS },
    )
    if (result.exitCode !== 0) {
      return undefined
    }
    return Buffer.from(result.stdout.trim(), 'base64').toString('utf8')
  }

  async set(service: string, key: string, value: string): Promise<void> {
    const encoded = Buffer.from(value, 'utf8').toString('base64')
    // -U updates the item in place when it already exists
    await execCommand(
      'security',
      ['add-generic-password', '-U', '-a', key, '-s', service, '-w', encoded],
      { timeoutMs: COMMAND_TIMEOUT_MS },
    )
  }

  async delete(service: string, key: string): Promise<void> {
    await execCommandFull('security', ['delete-generic-password', '-a', key, '-s', service], {
      timeoutMs: COMMAND_TIMEOUT_MS,
    })
  }
}
