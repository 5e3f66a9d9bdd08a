import type { Version } from '../../types/version'

import { formatVersion } from '../versions/format-version'

/**
 * Raised when the next release of the newest known version is requested.
 *
 * Callers usually treat it as "nothing to do" rather than a failure.
 */
export class NoUpcomingReleaseError extends Error {
  public readonly version: Version

  /**
   * Creates a new NoUpcomingReleaseError.
   *
   * @param version - The newest known version.
   */
  public constructor(version: Version) {
    super(
      `There is no upcoming release set after version ${formatVersion(version)}`,
    )
    this.name = 'NoUpcomingReleaseError'
    this.version = version
  }
}
