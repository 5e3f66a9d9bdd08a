import type { Version } from '../../types/version'

import { compareVersions } from '../versions/compare-versions'
import { sortVersions } from '../versions/sort-versions'

/**
 * Find the nearest version strictly older than `version`.
 *
 * @param versions - Known versions in any order.
 * @param version - Reference version.
 * @returns The previous version, or null when `version` is the oldest.
 */
export function findPreviousVersion(
  versions: readonly Version[],
  version: Version,
): Version | null {
  return (
    sortVersions(versions).find(
      candidate => compareVersions(candidate, version) < 0,
    ) ?? null
  )
}
