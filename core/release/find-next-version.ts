import type { Version } from '../../types/version'

import { compareVersions } from '../versions/compare-versions'
import { sortVersions } from '../versions/sort-versions'

/**
 * Find the nearest version strictly newer than `version`.
 *
 * @param versions - Known versions in any order.
 * @param version - Reference version.
 * @returns The next version, or null when `version` is the newest.
 */
export function findNextVersion(
  versions: readonly Version[],
  version: Version,
): Version | null {
  return (
    sortVersions(versions)
      .toReversed()
      .find(candidate => compareVersions(candidate, version) > 0) ?? null
  )
}
