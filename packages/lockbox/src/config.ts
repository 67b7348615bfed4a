/**
 * Configuration resolution and validation for lockbox.
 *
 * @remarks
 * Settings come from environment variables first. The organization id and
 * the state file path may instead be persisted in the OS credential store
 * (see {@link CredentialStore}), so they survive between invocations without
 * being exported in every shell.
 *
 * @packageDocumentation
 */

import { ConfigurationError } from './errors.js'
import { DEFAULT_TTL_MS } from './cache/secret-cache.js'
import {
  BOOTSTRAP_SERVICE,
  ORGANIZATION_ID_KEY,
  STATE_FILE_KEY,
  organizationService,
} from './credentials/types.js'
import type { CredentialStore } from './credentials/types.js'
import type { GatewayConfig } from './types.js'

/** Environment variable names read by lockbox. */
export const ENV_VARS = {
  apiUrl: 'API_URL',
  identityUrl: 'IDENTITY_URL',
  accessToken: 'BWS_TOKEN',
  stateFile: 'STATE_FILE',
  organizationId: 'ORGANIZATION_ID',
  cacheTtl: 'LOCKBOX_CACHE_TTL',
} as const

export const DEFAULT_API_URL = 'https://api.bitwarden.com'
export const DEFAULT_IDENTITY_URL = 'https://identity.bitwarden.com'

/** A view of environment variables, usually `process.env`. */
export type Environment = Record<string, string | undefined>

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readVar(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim()
  return value === undefined || value === '' ? undefined : value
}

/**
 * Determine the organization to read secrets from: the explicit argument,
 * else `ORGANIZATION_ID`, else the value persisted in the credential store.
 *
 * @throws ConfigurationError if none of them provides one.
 */
export async function resolveOrganizationId(
  explicit: string | undefined,
  env: Environment,
  store: CredentialStore,
): Promise<string> {
  if (explicit !== undefined && explicit.trim() !== '') {
    return explicit.trim()
  }
  const fromEnv = readVar(env, ENV_VARS.organizationId)
  if (fromEnv !== undefined) {
    return fromEnv
  }
  const stored = await store.get(BOOTSTRAP_SERVICE, ORGANIZATION_ID_KEY)
  if (stored !== undefined && stored.trim() !== '') {
    return stored.trim()
  }
  throw new ConfigurationError(
    `${ENV_VARS.organizationId} environment variable is required`,
    [ENV_VARS.organizationId],
  )
}

/**
 * Build the provider connection settings.
 *
 * @remarks
 * `STATE_FILE` falls back to the path stored under the organization's
 * credential-store service. Every missing value is reported in one error.
 *
 * @throws ConfigurationError listing the missing variables.
 */
export async function resolveGatewayConfig(
  env: Environment,
  store: CredentialStore,
  organizationId: string,
): Promise<GatewayConfig> {
  const accessToken = readVar(env, ENV_VARS.accessToken)
  const stateFile =
    readVar(env, ENV_VARS.stateFile) ??
    (await store.get(organizationService(organizationId), STATE_FILE_KEY))

  const missing: string[] = []
  if (accessToken === undefined) missing.push(ENV_VARS.accessToken)
  if (stateFile === undefined || stateFile.trim() === '') missing.push(ENV_VARS.stateFile)

  if (accessToken === undefined || stateFile === undefined || missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration: ${missing.join(', ')}`,
      missing,
    )
  }

  return {
    apiUrl: readVar(env, ENV_VARS.apiUrl) ?? DEFAULT_API_URL,
    identityUrl: readVar(env, ENV_VARS.identityUrl) ?? DEFAULT_IDENTITY_URL,
    accessToken,
    stateFile: stateFile.trim(),
  }
}

/**
 * Read the cache TTL from `LOCKBOX_CACHE_TTL` (seconds).
 *
 * @returns The TTL in milliseconds; the default when the variable is unset.
 * @throws ConfigurationError if the value is not a positive number.
 */
export function resolveCacheTtlMs(env: Environment): number {
  const raw = readVar(env, ENV_VARS.cacheTtl)
  if (raw === undefined) {
    return DEFAULT_TTL_MS
  }
  const seconds = Number(raw)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(
      `${ENV_VARS.cacheTtl} must be a positive number of seconds, got "${raw}"`,
      [ENV_VARS.cacheTtl],
    )
  }
  return seconds * 1000
}

/**
 * Validate an unknown value as a GatewayConfig, throwing on invalid structure.
 */
export function validateGatewayConfig(config: unknown): GatewayConfig {
  if (!isObject(config)) {
    throw new ConfigurationError('Gateway config must be an object', [])
  }

  const invalid: string[] = []
  const field = (name: keyof GatewayConfig): string => {
    const value = config[name]
    if (typeof value !== 'string' || value.trim() === '') {
      invalid.push(name)
      return ''
    }
    return value
  }

  const result: GatewayConfig = {
    apiUrl: field('apiUrl'),
    identityUrl: field('identityUrl'),
    accessToken: field('accessToken'),
    stateFile: field('stateFile'),
  }

  if (invalid.length > 0) {
    throw new ConfigurationError(
      `Gateway config fields must be non-empty strings: ${invalid.join(', ')}`,
      invalid,
    )
  }
  return result
}
