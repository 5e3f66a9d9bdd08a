import type { Version } from '../../types/version'

import { formatVersion } from '../versions/format-version'

/**
 * Git tag of a release.
 *
 * @param version - Release version.
 * @param tagPrefix - Configured tag prefix (e.g., 'apache-arrow-').
 * @returns Tag name.
 */
export function getReleaseTag(version: Version, tagPrefix: string): string {
  return `${tagPrefix}${formatVersion(version)}`
}
