/**
 * Machine identity resolution.
 *
 * @remarks
 * The identity is only ever used as key-derivation input and is never sent
 * anywhere. Sources, in order of precedence:
 *
 * 1. the OS machine-id file (`/etc/machine-id`, `/var/lib/dbus/machine-id`)
 * 2. a platform hardware UUID (macOS `ioreg`, Windows registry `MachineGuid`,
 *    Linux DMI `product_uuid`)
 * 3. hostname plus a random token persisted to `<tmpdir>/lockbox-machine-token`
 *
 * If the token file cannot be created, an in-process token is used instead.
 * That identity does not survive a restart, so anything encrypted under it is
 * unreadable by the next process.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { execCommandFull } from '../util/exec.js'
import { currentPlatform } from '../util/platform.js'
import type { Platform } from '../util/platform.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'

/** Which source produced the machine identity. */
export type IdentitySource = 'machine-id' | 'hardware' | 'token' | 'ephemeral'

/** Options for {@link MachineIdentity}. */
export interface MachineIdentityOptions {
  /** Machine-id files to try, in order. */
  machineIdPaths?: string[] | undefined
  /** Linux DMI product UUID file. */
  hardwareUuidPath?: string | undefined
  /** Location of the persisted fallback token. */
  tokenPath?: string | undefined
  /** Deadline for each subprocess probe. Defaults to 2000 ms. */
  probeTimeoutMs?: number | undefined
  /** Override platform detection. */
  platform?: Platform | undefined
  /** Override the hostname used with the fallback token. */
  hostname?: string | undefined
  logger?: Logger | undefined
}

export const DEFAULT_MACHINE_ID_PATHS: readonly string[] = [
  '/etc/machine-id',
  '/var/lib/dbus/machine-id',
]
const DEFAULT_HARDWARE_UUID_PATH = '/sys/class/dmi/id/product_uuid'
const DEFAULT_PROBE_TIMEOUT_MS = 2000
const TOKEN_FILE_NAME = 'lockbox-machine-token'
const TOKEN_BYTES = 32

const IOREG_UUID_PATTERN = /"IOPlatformUUID"\s*=\s*"([^"]+)"/
const MACHINE_GUID_PATTERN = /MachineGuid\s+REG_SZ\s+(\S+)/

/** Default location of the persisted fallback token. */
export function getDefaultTokenPath(): string {
  return path.join(os.tmpdir(), TOKEN_FILE_NAME)
}

async function readTrimmed(filePath: string): Promise<string | undefined> {
  try {
    const content = (await fs.readFile(filePath, 'utf8')).trim()
    return content === '' ? undefined : content
  } catch {
    return undefined
  }
}

/**
 * Resolves a stable, machine-specific string.
 *
 * @remarks
 * `resolve()` never rejects and is memoized per instance, so every encryption
 * and decryption in one process sees the same identity.
 *
 * @public
 */
export class MachineIdentity {
  readonly #machineIdPaths: readonly string[]
  readonly #hardwareUuidPath: string
  readonly #tokenPath: string
  readonly #probeTimeoutMs: number
  readonly #platform: Platform
  readonly #hostname: string
  readonly #logger: Logger
  #pending: Promise<string> | undefined
  #source: IdentitySource | undefined

  constructor(options?: MachineIdentityOptions) {
    this.#machineIdPaths = options?.machineIdPaths ?? DEFAULT_MACHINE_ID_PATHS
    this.#hardwareUuidPath = options?.hardwareUuidPath ?? DEFAULT_HARDWARE_UUID_PATH
    this.#tokenPath = options?.tokenPath ?? getDefaultTokenPath()
    this.#probeTimeoutMs = options?.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS
    this.#platform = options?.platform ?? currentPlatform()
    this.#hostname = options?.hostname ?? os.hostname()
    this.#logger = options?.logger ?? silentLogger()
  }

  /** The source of the resolved identity, or `undefined` before the first resolve. */
  get source(): IdentitySource | undefined {
    return this.#source
  }

  /** Resolve the machine identity. */
  resolve(): Promise<string> {
    this.#pending ??= this.#resolveOnce()
    return this.#pending
  }

  async #resolveOnce(): Promise<string> {
    for (const candidate of this.#machineIdPaths) {
      const id = await readTrimmed(candidate)
      if (id !== undefined) {
        return this.#settle('machine-id', id)
      }
    }

    const hardware = await this.#probeHardware()
    if (hardware !== undefined) {
      return this.#settle('hardware', hardware)
    }

    const persisted = await this.#readOrCreateToken()
    if (persisted !== undefined) {
      return this.#settle('token', `${this.#hostname}-${persisted}`)
    }

    const ephemeral = crypto.randomBytes(TOKEN_BYTES).toString('hex')
    return this.#settle('ephemeral', `${this.#hostname}-${ephemeral}`)
  }

  #settle(source: IdentitySource, identity: string): string {
    this.#source = source
    this.#logger.debug({ source }, 'machine identity resolved')
    return identity
  }

  async #probeHardware(): Promise<string | undefined> {
    switch (this.#platform) {
      case 'darwin':
        return this.#probeCommand('ioreg', ['-rd1', '-c', 'IOPlatformExpertDevice'], IOREG_UUID_PATTERN)
      case 'win32':
        return this.#probeCommand(
          'reg',
          ['query', 'HKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Cryptography', '/v', 'MachineGuid'],
          MACHINE_GUID_PATTERN,
        )
      case 'linux':
        return readTrimmed(this.#hardwareUuidPath)
    }
  }

  async #probeCommand(
    command: string,
    args: string[],
    pattern: RegExp,
  ): Promise<string | undefined> {
    try {
      const result = await execCommandFull(command, args, { timeoutMs: this.#probeTimeoutMs })
      if (result.exitCode !== 0) {
        return undefined
      }
      return pattern.exec(result.stdout)?.[1]
    } catch (error) {
      this.#logger.debug({ command, err: error }, 'hardware identity probe failed')
      return undefined
    }
  }

  async #readOrCreateToken(): Promise<string | undefined> {
    const existing = await readTrimmed(this.#tokenPath)
    if (existing !== undefined) {
      return existing
    }

    const token = crypto.randomBytes(TOKEN_BYTES).toString('hex')
    try {
      await fs.writeFile(this.#tokenPath, token, { encoding: 'utf8', mode: 0o600, flag: 'wx' })
      return token
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        // Another process created it first.
        const raced = await readTrimmed(this.#tokenPath)
        if (raced !== undefined) {
          return raced
        }
      }
      this.#logger.warn(
        { path: this.#tokenPath, err: error },
        'cannot persist machine token; identity will not survive a restart',
      )
      return undefined
    }
  }
}
