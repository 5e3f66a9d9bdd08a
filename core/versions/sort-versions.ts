import type { Version } from '../../types/version'

import { compareVersions } from './compare-versions'

/**
 * Sort versions newest first, the order the tracker reports them in.
 *
 * @param versions - Versions in any order.
 * @returns New sorted array.
 */
export function sortVersions(versions: readonly Version[]): Version[] {
  return versions.toSorted((a, b) => compareVersions(b, a))
}
