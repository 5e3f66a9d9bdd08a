import type { Version } from './version'
import type { Issue } from './issue'

/**
 * Internal client context shared by all Jira API functions.
 *
 * Stores auth, base URL and in-memory caches so a single run asks the tracker
 * for each list once.
 */
export interface JiraClientContext {
  /** Caches keyed by project (+ version for issues). */
  caches: {
    /** Cache of project version lists. */
    versions: Map<string, Version[]>

    /** Cache of issue lists keyed by `project@version`. */
    issues: Map<string, Issue[]>
  }

  /** Jira API token, if available. */
  token: undefined | string

  /** Jira server URL without trailing slash. */
  baseUrl: string
}
