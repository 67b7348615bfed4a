/**
 * Doctor/preflight system barrel export.
 *
 * @packageDocumentation
 */

export { runDoctor } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export { checkCredentialStore, checkIdentity, checkOrganization, checkProviderConfig } from './checks.js'
