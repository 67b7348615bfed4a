/**
 * What a command needs from its surroundings.
 *
 * @internal
 */

import { createLogger, defaultCredentialStore } from 'lockbox'
import type {
  CredentialStore,
  Environment,
  LockboxOptions,
  Logger,
  MachineIdentity,
  SecretsGateway,
} from 'lockbox'

export interface CommandContext {
  env: Environment
  credentialStore: CredentialStore
  logger: Logger
  /** Replaces the SDK connection. */
  gateway?: SecretsGateway | undefined
  identity?: MachineIdentity | undefined
}

export function defaultContext(): CommandContext {
  const logger = createLogger({ name: 'lockbox-cli', level: process.env.LOG_LEVEL ?? 'warn' })
  return {
    env: process.env,
    credentialStore: defaultCredentialStore({ logger }),
    logger,
  }
}

/** Session options for a one-shot command. */
export function lockboxOptions(context: CommandContext): LockboxOptions {
  return {
    env: context.env,
    credentialStore: context.credentialStore,
    logger: context.logger,
    gateway: context.gateway,
    identity: context.identity,
    clearOnExit: false,
  }
}
