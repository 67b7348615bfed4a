/**
 * Machine identity barrel export.
 */

export { MachineIdentity, DEFAULT_MACHINE_ID_PATHS, getDefaultTokenPath } from './machine-id.js'
export type { IdentitySource, MachineIdentityOptions } from './machine-id.js'
