/**
 * Secrets gateway over the Bitwarden Secrets Manager SDK client.
 *
 * @remarks
 * The adapter depends on {@link SecretsManagerClient}, the subset of the SDK
 * client it calls, with every response typed `unknown`. Each response is
 * validated here before the core sees it. A fetch syncs, lists secret
 * identifiers, resolves them with `getByIds`, and narrows the result to the
 * requested project.
 */

import { ProviderError } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { ProjectSummary, SecretMap } from '../types.js'
import type { SecretsGateway } from './types.js'

/** Secret operations of the SDK client. */
export interface SecretsClientPort {
  /** Present on SDK releases that support delta sync. */
  sync?: ((organizationId: string) => Promise<unknown>) | undefined
  list(organizationId: string): Promise<unknown>
  getByIds(ids: string[]): Promise<unknown>
}

/** Project operations of the SDK client. */
export interface ProjectsClientPort {
  list(organizationId: string): Promise<unknown>
}

/**
 * The part of the SDK client the gateway calls.
 * @public
 */
export interface SecretsManagerClient {
  secrets(): SecretsClientPort
  projects(): ProjectsClientPort
}

/** A secret as reported by the provider. */
export interface SecretRecord {
  id: string
  key: string
  value: string
  /** `null` when the provider reports no project association. */
  projectId: string | null
}

/** Options for {@link SdkSecretsGateway}. */
export interface SdkSecretsGatewayOptions {
  logger?: Logger | undefined
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Extract the `data` array of an SDK list response. */
function dataArray(raw: unknown): unknown[] | undefined {
  if (!isObject(raw) || !Array.isArray(raw.data)) {
    return undefined
  }
  return raw.data
}

/** Parse a secret identifier list into ids, or `undefined` if malformed. */
export function parseSecretIds(raw: unknown): string[] | undefined {
  const data = dataArray(raw)
  if (data === undefined) return undefined
  const ids: string[] = []
  for (const item of data) {
    if (!isObject(item) || typeof item.id !== 'string') return undefined
    ids.push(item.id)
  }
  return ids
}

/** Parse a secrets response into records, or `undefined` if malformed. */
export function parseSecretRecords(raw: unknown): SecretRecord[] | undefined {
  const data = dataArray(raw)
  if (data === undefined) return undefined
  const records: SecretRecord[] = []
  for (const item of data) {
    if (!isObject(item)) return undefined
    const { id, key, value, projectId } = item
    if (typeof id !== 'string') return undefined
    if (typeof key !== 'string') return undefined
    if (typeof value !== 'string') return undefined
    if (projectId !== undefined && projectId !== null && typeof projectId !== 'string') {
      return undefined
    }
    records.push({ id, key, value, projectId: projectId ?? null })
  }
  return records
}

/** Parse a projects response, or `undefined` if malformed. */
export function parseProjects(raw: unknown): ProjectSummary[] | undefined {
  const data = dataArray(raw)
  if (data === undefined) return undefined
  const projects: ProjectSummary[] = []
  for (const item of data) {
    if (!isObject(item)) return undefined
    const { id, name, creationDate } = item
    if (typeof id !== 'string' || typeof name !== 'string') return undefined
    projects.push({ id, name, creationDate: formatCreationDate(creationDate) })
  }
  return projects
}

/** The SDK revives timestamps as `Date`; raw responses carry ISO strings. */
function formatCreationDate(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString()
  }
  return typeof value === 'string' ? value : ''
}

/**
 * Narrow records to a project and collapse them into a map.
 *
 * @remarks
 * A record with no project association is kept for every `projectId`: it
 * is treated as unscoped rather than as a mismatch. With no `projectId` (or
 * an empty one) every record is kept. When two records share a name the later
 * one wins.
 */
export function selectSecrets(records: readonly SecretRecord[], projectId?: string): SecretMap {
  const secrets = new Map<string, string>()
  const filter = projectId === undefined || projectId === '' ? undefined : projectId
  for (const record of records) {
    if (filter !== undefined && record.projectId !== null && record.projectId !== filter) {
      continue
    }
    secrets.set(record.key, record.value)
  }
  // fromEntries defines own properties, so a name like `__proto__` survives.
  return Object.fromEntries(secrets)
}

/**
 * {@link SecretsGateway} backed by a Bitwarden Secrets Manager SDK client.
 * @public
 */
export class SdkSecretsGateway implements SecretsGateway {
  readonly #client: SecretsManagerClient
  readonly #logger: Logger

  constructor(client: SecretsManagerClient, options?: SdkSecretsGatewayOptions) {
    this.#client = client
    this.#logger = options?.logger ?? silentLogger()
  }

  async fetch(organizationId: string, projectId?: string): Promise<SecretMap> {
    const secrets = this.#client.secrets()

    const sync = secrets.sync
    if (sync !== undefined) {
      await call('secrets.sync', () => sync.call(secrets, organizationId))
    }

    const listed = await call('secrets.list', () => secrets.list(organizationId))
    const ids = parseSecretIds(listed)
    if (ids === undefined) {
      throw new ProviderError('Unexpected response shape from secrets.list', 'secrets.list')
    }
    if (ids.length === 0) {
      return {}
    }

    const detailed = await call('secrets.getByIds', () => secrets.getByIds(ids))
    const records = parseSecretRecords(detailed)
    if (records === undefined) {
      throw new ProviderError('Unexpected response shape from secrets.getByIds', 'secrets.getByIds')
    }

    const selected = selectSecrets(records, projectId)
    this.#logger.debug(
      { organizationId, projectId, received: records.length, selected: Object.keys(selected).length },
      'fetched secrets',
    )
    return selected
  }

  async listProjects(organizationId: string): Promise<ProjectSummary[]> {
    const raw = await call('projects.list', () => this.#client.projects().list(organizationId))
    const projects = parseProjects(raw)
    if (projects === undefined) {
      throw new ProviderError('Unexpected response shape from projects.list', 'projects.list')
    }
    return projects
  }
}

/** Run a provider call, reporting any failure as a ProviderError. */
async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof ProviderError) {
      throw error
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new ProviderError(`Secrets provider ${operation} failed: ${message}`, operation, {
      cause: error,
    })
  }
}
