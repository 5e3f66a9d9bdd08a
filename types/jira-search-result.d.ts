/** A page of the Jira search endpoint. */
export interface JiraSearchResult {
  /** Raw issue records, validated individually. */
  issues: unknown[]

  /** Page size granted by the server. */
  maxResults: number

  /** Offset of the first issue on this page. */
  startAt: number

  /** Total number of matching issues. */
  total: number
}
