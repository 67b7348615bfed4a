/**
 * Platform detection utilities.
 */

/**
 * @internal
 */
export type Platform = 'darwin' | 'win32' | 'linux'

/**
 * Get the current platform. Anything that is neither macOS nor Windows is
 * handled as Linux (POSIX permission bits, Secret Service).
 */
export function currentPlatform(): Platform {
  const p = process.platform
  if (p === 'darwin' || p === 'win32') {
    return p
  }
  return 'linux'
}
