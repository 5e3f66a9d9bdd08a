import type { ReleaseKind } from '../../types/release-kind'
import type { Version } from '../../types/version'

import { sortVersions } from '../versions/sort-versions'
import { classifyVersion } from './classify-version'

/**
 * Versions that bound the commit range of a release of the given kind.
 *
 * - `major`: major releases only.
 * - `minor`: major and minor releases.
 * - `patch`: every version.
 *
 * @param versions - Every known version.
 * @param kind - Kind of the release asking.
 * @returns Matching versions, newest first.
 */
export function getSiblingVersions(
  versions: readonly Version[],
  kind: ReleaseKind,
): Version[] {
  let siblings = versions.filter(version => {
    switch (kind) {
      case 'major':
        return classifyVersion(version) === 'major'
      case 'minor':
        return version.patch === 0
      case 'patch':
        return true
    }
  })
  return sortVersions(siblings)
}
