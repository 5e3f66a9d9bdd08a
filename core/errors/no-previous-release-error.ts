import type { Version } from '../../types/version'

import { formatVersion } from '../versions/format-version'

/** Raised when the previous release of the oldest known version is requested. */
export class NoPreviousReleaseError extends Error {
  public readonly version: Version

  /**
   * Creates a new NoPreviousReleaseError.
   *
   * @param version - The oldest known version.
   */
  public constructor(version: Version) {
    super(`There is no release prior to version ${formatVersion(version)}`)
    this.name = 'NoPreviousReleaseError'
    this.version = version
  }
}
