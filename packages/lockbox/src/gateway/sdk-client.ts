/**
 * Connection to Bitwarden Secrets Manager through the official SDK.
 */

import * as path from 'node:path'
import { ProviderError } from '../errors.js'
import { ensurePrivateDirectory, hardenFile } from '../fs/permissions.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import type { GatewayConfig } from '../types.js'
import { SdkSecretsGateway } from './sdk-gateway.js'

const USER_AGENT = 'lockbox'

/** Options for {@link connectSecretsManager}. */
export interface ConnectOptions {
  logger?: Logger | undefined
}

/**
 * Create an SDK client, log in with the machine-account access token, and
 * restrict the resulting state file to its owner.
 *
 * @remarks
 * The SDK and its native binding load only here, on first connection.
 *
 * @throws ProviderError if the SDK cannot be loaded or login fails.
 */
export async function connectSecretsManager(
  config: GatewayConfig,
  options?: ConnectOptions,
): Promise<SdkSecretsGateway> {
  const logger = options?.logger ?? silentLogger()
  await ensurePrivateDirectory(path.dirname(path.resolve(config.stateFile)), { logger })

  let sdk: typeof import('@bitwarden/sdk-napi')
  try {
    sdk = await import('@bitwarden/sdk-napi')
  } catch (error) {
    throw new ProviderError('Bitwarden SDK could not be loaded', 'load', { cause: error })
  }

  const client = new sdk.BitwardenClient({
    apiUrl: config.apiUrl,
    identityUrl: config.identityUrl,
    userAgent: USER_AGENT,
  })

  try {
    await client.auth().loginAccessToken(config.accessToken, config.stateFile)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ProviderError(`Authentication with the secrets provider failed: ${message}`, 'login', {
      cause: error,
    })
  }

  await hardenFile(config.stateFile, { logger })
  logger.debug({ apiUrl: config.apiUrl }, 'connected to secrets provider')
  return new SdkSecretsGateway(client, { logger })
}
