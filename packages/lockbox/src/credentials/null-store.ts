/**
 * Credential store used when no OS facility is present.
 */

import type { CredentialStore } from './types.js'

/**
 * Store that holds nothing: reads are absent, writes and deletes are no-ops.
 * Configuration then has to come from environment variables.
 *
 * @public
 */
export class NullCredentialStore implements CredentialStore {
  readonly type = 'none'
  readonly displayName = 'No credential store'

  isAvailable(): Promise<boolean> {
    return Promise.resolve(false)
  }

  get(_service: string, _key: string): Promise<string | undefined> {
    return Promise.resolve(undefined)
  }

  set(_service: string, _key: string, _value: string): Promise<void> {
    return Promise.resolve()
  }

  delete(_service: string, _key: string): Promise<void> {
    return Promise.resolve()
  }
}
