/**
 * OS credential store abstraction.
 */

/**
 * Service namespace for values that are not tied to an organization, such as
 * the default organization id.
 */
export const BOOTSTRAP_SERVICE = 'lockbox'

/** Key under {@link BOOTSTRAP_SERVICE} holding the default organization id. */
export const ORGANIZATION_ID_KEY = 'organization_id'

/** Key under an organization's service holding the SDK state file path. */
export const STATE_FILE_KEY = 'state_file'

/** Service namespace for values that belong to one organization. */
export function organizationService(organizationId: string): string {
  return `${BOOTSTRAP_SERVICE}_${organizationId}`
}

/**
 * Key/value access to an OS-level secure store.
 *
 * @remarks
 * Used for bootstrap configuration only (state file path, organization id),
 * never for secret values. `delete` of an absent entry is not an error.
 *
 * @public
 */
export interface CredentialStore {
  /** Unique type identifier for this store. */
  readonly type: string

  /** Human-readable display name for this store. */
  readonly displayName: string

  /**
   * Check whether this store can be used on the current system.
   */
  isAvailable(): Promise<boolean>

  /**
   * Read a value.
   * @returns The stored value, or `undefined` if there is none.
   */
  get(service: string, key: string): Promise<string | undefined>

  /** Store a value, replacing any existing one. */
  set(service: string, key: string, value: string): Promise<void>

  /** Remove a value if present. */
  delete(service: string, key: string): Promise<void>
}
