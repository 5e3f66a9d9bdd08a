/** Raised when a version string, issue key or tracker record is malformed. */
export class ParseError extends Error {
  /**
   * Creates a new ParseError.
   *
   * @param message - Description of the malformed input.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'ParseError'
  }
}
