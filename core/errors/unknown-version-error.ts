/** Raised when the tracker does not list the requested version. */
export class UnknownVersionError extends Error {
  /**
   * Creates a new UnknownVersionError.
   *
   * @param version - Requested version string.
   * @param project - Tracker project that was searched.
   */
  public constructor(version: string, project: string) {
    super(`Version ${version} is not defined in the ${project} project`)
    this.name = 'UnknownVersionError'
  }
}
