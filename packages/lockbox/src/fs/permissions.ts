/**
 * Owner-only permissions for on-disk authentication state.
 *
 * @remarks
 * POSIX systems get mode bits (`0o600` files, `0o700` directories). On
 * Windows the ACL is reset with `icacls`: inherited entries are removed and
 * the current user is granted full control. Failing to harden is logged and
 * reported through the return value; the file stays usable.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { FilesystemError } from '../errors.js'
import { silentLogger } from '../logger.js'
import type { Logger } from '../logger.js'
import { execCommand } from '../util/exec.js'
import { currentPlatform } from '../util/platform.js'
import type { Platform } from '../util/platform.js'

const FILE_MODE = 0o600
const DIRECTORY_MODE = 0o700
const ICACLS_TIMEOUT_MS = 10_000

/** Options shared by the permission helpers. */
export interface PermissionOptions {
  logger?: Logger | undefined
  /** Override platform detection. */
  platform?: Platform | undefined
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch {
    return false
  }
}

async function restrictAcl(target: string, directory: boolean): Promise<void> {
  const user = os.userInfo().username
  const grant = directory ? `${user}:(OI)(CI)F` : `${user}:F`
  await execCommand('icacls', [target, '/inheritance:r', '/grant:r', grant], {
    timeoutMs: ICACLS_TIMEOUT_MS,
  })
}

async function restrict(target: string, directory: boolean, platform: Platform): Promise<void> {
  const permission = directory ? 'rwx' : 'rw'
  try {
    if (platform === 'win32') {
      await restrictAcl(target, directory)
    } else {
      await fs.chmod(target, directory ? DIRECTORY_MODE : FILE_MODE)
    }
  } catch (error) {
    throw new FilesystemError(
      `Failed to restrict ${target} to owner-only ${permission}`,
      target,
      permission,
      { cause: error },
    )
  }
}

function logFailure(logger: Logger, error: unknown): void {
  if (error instanceof FilesystemError) {
    logger.warn(
      { path: error.path, permission: error.permission, err: error.cause },
      'could not harden permissions; continuing with weaker on-disk protection',
    )
    return
  }
  logger.warn({ err: error }, 'could not harden permissions; continuing with weaker on-disk protection')
}

/**
 * Create `dir` (and missing parents) when it does not exist and restrict the
 * newly created directory to its owner. An existing directory is left as is.
 *
 * @returns `true` if the directory exists and, when created here, was hardened.
 */
export async function ensurePrivateDirectory(
  dir: string,
  options?: PermissionOptions,
): Promise<boolean> {
  const logger = options?.logger ?? silentLogger()
  const platform = options?.platform ?? currentPlatform()

  if (await pathExists(dir)) {
    return true
  }

  try {
    await fs.mkdir(dir, { recursive: true, mode: DIRECTORY_MODE })
  } catch (error) {
    logFailure(
      logger,
      new FilesystemError(`Failed to create directory ${dir}`, dir, 'rwx', { cause: error }),
    )
    return false
  }

  try {
    // mkdir's mode is filtered through the umask; apply it explicitly.
    await restrict(dir, true, platform)
    return true
  } catch (error) {
    logFailure(logger, error)
    return false
  }
}

/**
 * Restrict an authentication-state file to owner read/write, preparing its
 * parent directory with {@link ensurePrivateDirectory} first.
 *
 * @returns `true` if the file now has owner-only permissions, `false` if it
 * does not exist or could not be hardened.
 */
export async function hardenFile(filePath: string, options?: PermissionOptions): Promise<boolean> {
  const logger = options?.logger ?? silentLogger()
  const platform = options?.platform ?? currentPlatform()
  const target = path.resolve(filePath)

  await ensurePrivateDirectory(path.dirname(target), { logger, platform })

  if (!(await pathExists(target))) {
    logger.debug({ path: target }, 'nothing to harden yet; file does not exist')
    return false
  }

  try {
    await restrict(target, false, platform)
    return true
  } catch (error) {
    logFailure(logger, error)
    return false
  }
}
