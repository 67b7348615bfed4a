/**
 * Individual preflight checks.
 */

import { ENV_VARS, resolveGatewayConfig, resolveOrganizationId } from '../config.js'
import type { Environment } from '../config.js'
import type { CredentialStore } from '../credentials/types.js'
import { ConfigurationError } from '../errors.js'
import type { MachineIdentity } from '../identity/machine-id.js'
import type { PreflightCheck } from '../types.js'

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Check which source the machine identity comes from. An ephemeral identity
 * works, but nothing encrypted under it can be read by the next process.
 * @internal
 */
export async function checkIdentity(identity: MachineIdentity): Promise<PreflightCheck> {
  const name = 'machine identity'
  await identity.resolve()
  const source = identity.source
  if (source === undefined || source === 'ephemeral') {
    return {
      name,
      status: 'degraded',
      detail: 'ephemeral',
      reason: 'no machine-id, hardware UUID or writable token file; cached secrets will not survive a restart',
    }
  }
  return { name, status: 'ok', detail: source }
}

/**
 * Check that an OS credential store can be used for bootstrap values.
 * @internal
 */
export async function checkCredentialStore(store: CredentialStore): Promise<PreflightCheck> {
  const name = 'credential store'
  try {
    if (await store.isAvailable()) {
      return { name, status: 'ok', detail: store.displayName }
    }
  } catch (error) {
    return { name, status: 'missing', reason: describeError(error) }
  }
  return {
    name,
    status: 'missing',
    reason: 'no OS credential store found; configuration must come from environment variables',
  }
}

/**
 * Check that an organization id is configured.
 * @internal
 */
export async function checkOrganization(
  env: Environment,
  store: CredentialStore,
): Promise<PreflightCheck> {
  const name = 'organization'
  try {
    const organizationId = await resolveOrganizationId(undefined, env, store)
    return { name, status: 'ok', detail: organizationId }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return {
        name,
        status: 'missing',
        reason: `set ${ENV_VARS.organizationId} or run "lockbox config set organization-id <id>"`,
      }
    }
    return { name, status: 'missing', reason: describeError(error) }
  }
}

/**
 * Check the provider connection settings for an organization. Without an
 * organization only the environment can be consulted.
 * @internal
 */
export async function checkProviderConfig(
  env: Environment,
  store: CredentialStore,
  organizationId: string | undefined,
): Promise<PreflightCheck> {
  const name = 'provider configuration'
  if (organizationId === undefined) {
    const missing = [ENV_VARS.accessToken, ENV_VARS.stateFile].filter(
      (variable) => (env[variable]?.trim() ?? '') === '',
    )
    if (missing.length === 0) {
      return { name, status: 'ok' }
    }
    return { name, status: 'missing', reason: `missing ${missing.join(', ')}` }
  }

  try {
    const config = await resolveGatewayConfig(env, store, organizationId)
    return { name, status: 'ok', detail: config.apiUrl }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { name, status: 'missing', reason: `missing ${error.missing.join(', ')}` }
    }
    return { name, status: 'missing', reason: describeError(error) }
  }
}
