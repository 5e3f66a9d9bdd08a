/** Issue as returned by the Jira search endpoint (used fields only). */
export interface JiraIssueRecord {
  /** Requested fields. */
  fields: {
    /** Issue type descriptor. */
    issuetype: {
      /** Display name of the type. */
      name: string
    }

    /** Issue summary. */
    summary: string
  }

  /** Issue key. */
  key: string
}
