/**
 * Secrets gateway double that serves fixed records and counts calls.
 */

import { selectSecrets } from 'lockbox'
import type { ProjectSummary, SecretMap, SecretRecord, SecretsGateway } from 'lockbox'

/** A recorded call to {@link ScriptedSecretsGateway.fetch}. */
export interface FetchCall {
  organizationId: string
  projectId: string | undefined
}

/** Options for {@link ScriptedSecretsGateway}. */
export interface ScriptedSecretsGatewayOptions {
  records?: SecretRecord[] | undefined
  projects?: ProjectSummary[] | undefined
}

/**
 * A `SecretsGateway` that answers from in-memory records, applying the same
 * project selection as the SDK gateway.
 *
 * @example
 * ```ts
 * const gateway = new ScriptedSecretsGateway({
 *   records: [{ id: '1', key: 'A', value: '1', projectId: null }],
 * })
 * await gateway.fetch('org') // { A: '1' }
 * gateway.fetchCount // 1
 * ```
 *
 * @public
 */
export class ScriptedSecretsGateway implements SecretsGateway {
  readonly calls: FetchCall[] = []
  #records: SecretRecord[]
  #projects: ProjectSummary[]
  #failure: Error | undefined

  constructor(options?: ScriptedSecretsGatewayOptions) {
    this.#records = options?.records ?? []
    this.#projects = options?.projects ?? []
  }

  /** Number of `fetch` calls so far. */
  get fetchCount(): number {
    return this.calls.length
  }

  /** Replace the records served by later fetches. */
  setRecords(records: SecretRecord[]): void {
    this.#records = records
  }

  /** Make later calls reject with `error`; pass `undefined` to recover. */
  failWith(error: Error | undefined): void {
    this.#failure = error
  }

  fetch(organizationId: string, projectId?: string): Promise<SecretMap> {
    this.calls.push({ organizationId, projectId })
    if (this.#failure !== undefined) {
      return Promise.reject(this.#failure)
    }
    return Promise.resolve(selectSecrets(this.#records, projectId))
  }

  listProjects(_organizationId: string): Promise<ProjectSummary[]> {
    if (this.#failure !== undefined) {
      return Promise.reject(this.#failure)
    }
    return Promise.resolve(this.#projects.map((project) => ({ ...project })))
  }
}
