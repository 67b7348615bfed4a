/**
 * @lockbox/test-helpers: test doubles for lockbox consumers.
 *
 * @packageDocumentation
 */

export { InMemoryCredentialStore } from './in-memory-credential-store.js'
export type { InMemoryCredentialStoreOptions } from './in-memory-credential-store.js'
export { ScriptedSecretsGateway } from './scripted-gateway.js'
export type { FetchCall, ScriptedSecretsGatewayOptions } from './scripted-gateway.js'
export { TestLockbox, TEST_ORGANIZATION_ID } from './test-lockbox.js'
export type { TestLockboxOptions } from './test-lockbox.js'
