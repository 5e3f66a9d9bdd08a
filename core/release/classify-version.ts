import type { ReleaseKind } from '../../types/release-kind'
import type { Version } from '../../types/version'

/**
 * Decide the kind of release a version denotes.
 *
 * Rules:
 *
 * - `X.0.0` with X >= 1 is a major release.
 * - `0.Y.0` is a major release too: before 1.0 every minor bump was one.
 * - `X.Y.0` is a minor release.
 * - Anything with a patch component is a patch release.
 *
 * @param version - Version to classify.
 * @returns Release kind.
 */
export function classifyVersion(version: Version): ReleaseKind {
  if (version.patch !== 0) {
    return 'patch'
  }
  if (version.minor === 0 || version.major === 0) {
    return 'major'
  }
  return 'minor'
}
