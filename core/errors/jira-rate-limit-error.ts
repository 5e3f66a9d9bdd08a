/** Custom error for Jira throttling responses. */
export class JiraRateLimitError extends Error {
  public readonly status = 429

  /**
   * Creates a new JiraRateLimitError.
   *
   * @param retryAfter - Seconds to wait, when the server provided it.
   */
  public constructor(retryAfter: number | null) {
    super(
      retryAfter === null
        ? 'Jira API rate limit exceeded'
        : `Jira API rate limit exceeded. Retry after ${retryAfter}s`,
    )
    this.name = 'JiraRateLimitError'
  }
}
