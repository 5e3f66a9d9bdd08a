import type { Version } from '../../types/version'

/**
 * Render a version as `major.minor.patch`, without metadata.
 *
 * @param version - Version to render.
 * @returns Version string.
 */
export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`
}
