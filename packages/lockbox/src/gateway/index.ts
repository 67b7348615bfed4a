/**
 * Gateway barrel export.
 */

export type { SecretsGateway } from './types.js'
export {
  SdkSecretsGateway,
  selectSecrets,
  parseSecretIds,
  parseSecretRecords,
  parseProjects,
} from './sdk-gateway.js'
export type {
  SecretsManagerClient,
  SecretsClientPort,
  ProjectsClientPort,
  SecretRecord,
  SdkSecretsGatewayOptions,
} from './sdk-gateway.js'
export { connectSecretsManager } from './sdk-client.js'
export type { ConnectOptions } from './sdk-client.js'
