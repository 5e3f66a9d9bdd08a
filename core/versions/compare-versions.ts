import semver from 'semver'

import type { Version } from '../../types/version'

import { formatVersion } from './format-version'

/**
 * Compare two versions by their numeric components.
 *
 * Release flags and dates are ignored.
 *
 * @param a - First version.
 * @param b - Second version.
 * @returns Negative when `a` is older, positive when newer, 0 when equal.
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  return semver.compare(formatVersion(a), formatVersion(b))
}
