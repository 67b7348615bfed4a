/**
 * Credential store barrel export.
 */

export type { CredentialStore } from './types.js'
export {
  BOOTSTRAP_SERVICE,
  ORGANIZATION_ID_KEY,
  STATE_FILE_KEY,
  organizationService,
} from './types.js'
export { KeychainCredentialStore } from './keychain-store.js'
export { SecretToolCredentialStore } from './secret-tool-store.js'
export { DpapiCredentialStore } from './dpapi-store.js'
export type { DpapiCredentialStoreOptions } from './dpapi-store.js'
export { NullCredentialStore } from './null-store.js'
export {
  ProbingCredentialStore,
  platformCredentialStores,
  defaultCredentialStore,
} from './probing-store.js'
export type { ProbingCredentialStoreOptions } from './probing-store.js'
