/**
 * lockbox: secrets from a Bitwarden Secrets Manager organization, cached in
 * memory under a machine-bound key.
 *
 * @packageDocumentation
 */

export {
  LockboxError,
  ConfigurationError,
  CryptoUnavailableError,
  DecryptFailureError,
  ProviderError,
  FilesystemError,
} from './errors.js'
export type { DecryptFailureReason } from './errors.js'

export type {
  SecretMap,
  EncryptedPayload,
  ProjectSummary,
  GatewayConfig,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
} from './types.js'

export { ok, err, unwrap } from './result.js'
export type { Result } from './result.js'

export { createLogger, silentLogger } from './logger.js'
export type { Logger, LogContext, CreateLoggerOptions } from './logger.js'

export {
  ENV_VARS,
  DEFAULT_API_URL,
  DEFAULT_IDENTITY_URL,
  resolveOrganizationId,
  resolveGatewayConfig,
  resolveCacheTtlMs,
  validateGatewayConfig,
} from './config.js'
export type { Environment } from './config.js'

export { MachineIdentity, DEFAULT_MACHINE_ID_PATHS, getDefaultTokenPath } from './identity/index.js'
export type { IdentitySource, MachineIdentityOptions } from './identity/index.js'

export { deriveKey, SecretCipher, canonicalJson, PBKDF2_ITERATIONS, KEY_BYTES, SALT_BYTES } from './crypto/index.js'
export type { DerivedKey, KeyDeriver, SecretCipherOptions } from './crypto/index.js'

export { SecretCache, DEFAULT_TTL_MS, cacheKey } from './cache/secret-cache.js'
export type { CacheCipher, CacheGetOptions, SecretCacheOptions } from './cache/secret-cache.js'

export type { CredentialStore, DpapiCredentialStoreOptions, ProbingCredentialStoreOptions } from './credentials/index.js'
export {
  BOOTSTRAP_SERVICE,
  ORGANIZATION_ID_KEY,
  STATE_FILE_KEY,
  organizationService,
  KeychainCredentialStore,
  SecretToolCredentialStore,
  DpapiCredentialStore,
  NullCredentialStore,
  ProbingCredentialStore,
  platformCredentialStores,
  defaultCredentialStore,
} from './credentials/index.js'

export type {
  SecretsGateway,
  SecretsManagerClient,
  SecretsClientPort,
  ProjectsClientPort,
  SecretRecord,
  SdkSecretsGatewayOptions,
  ConnectOptions,
} from './gateway/index.js'
export {
  SdkSecretsGateway,
  selectSecrets,
  parseSecretIds,
  parseSecretRecords,
  parseProjects,
  connectSecretsManager,
} from './gateway/index.js'

export { ensurePrivateDirectory, hardenFile } from './fs/permissions.js'
export type { PermissionOptions } from './fs/permissions.js'

export { applyToEnvironment } from './env.js'
export type { ApplyToEnvironmentOptions } from './env.js'

export { runDoctor, checkIdentity, checkCredentialStore, checkOrganization, checkProviderConfig } from './doctor/index.js'
export type { RunDoctorOptions } from './doctor/index.js'

export type { Platform } from './util/platform.js'
export { currentPlatform } from './util/platform.js'

export { Lockbox, withLockbox } from './lockbox.js'
export type {
  LockboxOptions,
  GetSecretsOptions,
  LoadEnvOptions,
  LoadAllEnvOptions,
  GatewayConnector,
} from './lockbox.js'
