/**
 * Doctor runner: runs the preflight checks and aggregates results.
 *
 * @packageDocumentation
 */

import type { Environment } from '../config.js'
import { defaultCredentialStore } from '../credentials/probing-store.js'
import type { CredentialStore } from '../credentials/types.js'
import { MachineIdentity } from '../identity/machine-id.js'
import type { PreflightCheck, PreflightResult } from '../types.js'
import { checkCredentialStore, checkIdentity, checkOrganization, checkProviderConfig } from './checks.js'

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Defaults to `process.env`. */
  env?: Environment | undefined
  credentialStore?: CredentialStore | undefined
  identity?: MachineIdentity | undefined
}

/** A check result together with whether it is required. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

/**
 * Run all preflight checks and aggregate the results.
 *
 * @remarks
 * The identity and the configuration are required; a degraded identity is
 * reported as a warning. The credential store is optional.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const env = options?.env ?? process.env
  const store = options?.credentialStore ?? defaultCredentialStore()
  const identity = options?.identity ?? new MachineIdentity()

  const [identityCheck, storeCheck, organizationCheck] = await Promise.all([
    checkIdentity(identity),
    checkCredentialStore(store),
    checkOrganization(env, store),
  ])
  const organizationId = organizationCheck.status === 'ok' ? organizationCheck.detail : undefined
  const providerCheck = await checkProviderConfig(env, store, organizationId)

  const resolved: ResolvedEntry[] = [
    { required: true, result: identityCheck },
    { required: false, result: storeCheck },
    { required: true, result: organizationCheck },
    { required: true, result: providerCheck },
  ]

  const ready = resolved.every(({ required, result }) => !required || result.status !== 'missing')

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    const suffix = result.reason !== undefined ? `: ${result.reason}` : ''
    if (result.status === 'missing') {
      if (required) {
        nextSteps.push(`Configure ${result.name}${suffix}`)
      } else {
        warnings.push(`Optional ${result.name} not available${suffix}`)
      }
    } else if (result.status === 'degraded') {
      warnings.push(`${result.name} is degraded${suffix}`)
    }
  }

  return { checks: resolved.map(({ result }) => result), ready, warnings, nextSteps }
}
