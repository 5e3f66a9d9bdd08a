/** Project constants used to name releases and reach external systems. */
export interface ReleaseConfig {
  /** Commit web URL template, `{hexsha}` is replaced by the hash. */
  commitUrl: string

  /** Main development branch (e.g., 'master'). */
  mainBranch: string

  /** Prefix of release tags (e.g., 'apache-arrow-'). */
  tagPrefix: string

  /** Jira server URL. */
  jiraUrl: string

  /** Jira project key (e.g., 'ARROW'). */
  project: string
}
