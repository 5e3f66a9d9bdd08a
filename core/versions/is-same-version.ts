import type { Version } from '../../types/version'

import { compareVersions } from './compare-versions'

/**
 * Check whether two versions denote the same logical release.
 *
 * @param a - First version.
 * @param b - Second version.
 * @returns True when major, minor and patch are equal.
 */
export function isSameVersion(a: Version, b: Version): boolean {
  return compareVersions(a, b) === 0
}
