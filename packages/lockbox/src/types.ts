/**
 * Shared types and interfaces for lockbox.
 */

/**
 * Secret name to secret value. Names are unique; order is irrelevant.
 * @public
 */
export type SecretMap = Record<string, string>

/**
 * Wire form of an encrypted secret map: `<base64url salt>:<compact JWE>`.
 *
 * @remarks
 * There is exactly one separator colon; the ciphertext token never contains
 * one, and parsers split on the first colon only.
 *
 * @public
 */
export type EncryptedPayload = string

/** A project visible to the configured machine account. */
export interface ProjectSummary {
  id: string
  name: string
  /** ISO-8601 creation timestamp as reported by the provider. */
  creationDate: string
}

/** Settings needed to connect to the secrets provider. */
export interface GatewayConfig {
  /** Provider API endpoint. */
  apiUrl: string
  /** Provider identity endpoint. */
  identityUrl: string
  /** Machine-account access token. */
  accessToken: string
  /** Path of the SDK authentication state file. */
  stateFile: string
}

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'degraded' | 'missing'

/** Result of a preflight check for a single concern. */
export interface PreflightCheck {
  /** Human-readable name of the concern being checked. */
  name: string
  /** Whether the concern is satisfied. */
  status: PreflightCheckStatus
  /** Short detail, e.g. which identity source was used. */
  detail?: string | undefined
  /** Human-readable explanation of why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results. */
  checks: PreflightCheck[]
  /** `true` if all required checks passed. */
  ready: boolean
  /** Non-fatal advisory messages. */
  warnings: string[]
  /** Action items the user should complete before secrets can be fetched. */
  nextSteps: string[]
}
