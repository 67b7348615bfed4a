/**
 * Port between the cache and the remote secrets provider.
 */

import type { ProjectSummary, SecretMap } from '../types.js'

/**
 * Fetches the authoritative secret set for an organization.
 *
 * @remarks
 * Implementations validate the provider's responses themselves and hand the
 * core a plain {@link SecretMap}. Failures are reported as `ProviderError`.
 *
 * @public
 */
export interface SecretsGateway {
  /**
   * Fetch the secrets of `organizationId`, narrowed to `projectId` when given.
   * Secrets without a project association are included for every project.
   */
  fetch(organizationId: string, projectId?: string): Promise<SecretMap>

  /** List the projects of `organizationId`. */
  listProjects(organizationId: string): Promise<ProjectSummary[]>
}
