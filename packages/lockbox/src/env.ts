/**
 * Copying secrets into environment variables.
 */

import type { Environment } from './config.js'
import type { SecretMap } from './types.js'

/** Options for {@link applyToEnvironment}. */
export interface ApplyToEnvironmentOptions {
  /** Replace variables that are already set. Defaults to `false`. */
  override?: boolean | undefined
  /** Environment to write to. Defaults to `process.env`. */
  target?: Environment | undefined
}

/**
 * Set one environment variable per secret.
 *
 * @returns The names that were written, in insertion order.
 */
export function applyToEnvironment(
  secrets: SecretMap,
  options?: ApplyToEnvironmentOptions,
): string[] {
  const target = options?.target ?? process.env
  const override = options?.override ?? false
  const written: string[] = []
  for (const [name, value] of Object.entries(secrets)) {
    if (!override && target[name] !== undefined) {
      continue
    }
    target[name] = value
    written.push(name)
  }
  return written
}
