/** Project version as returned by the Jira project versions endpoint. */
export interface JiraVersionRecord {
  /** Release date (YYYY-MM-DD), absent for unreleased versions. */
  releaseDate?: string

  /** Whether the version is released. */
  released: boolean

  /** Version name (e.g., '1.0.0'). */
  name: string
}
