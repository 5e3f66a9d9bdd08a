import type { Version } from './version'
import type { Issue } from './issue'

/**
 * Issue tracker operations used by release curation.
 *
 * Results are cached per project for the lifetime of the client.
 */
export interface JiraClient {
  /** Issues whose fix version is exactly `version`. */
  projectIssues(version: Version | string, project: string): Promise<Issue[]>

  /** Every version of a project known to the tracker, newest first. */
  projectVersions(project: string): Promise<Version[]>
}
